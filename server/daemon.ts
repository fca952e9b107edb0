import type { Server } from "http";
import { openWithMacOs, type UrlOpener } from "./actions.js";
import { createApp } from "./app.js";
import { CALENDAR_PRIVACY_HINT, describeError } from "./calendar_errors.js";
import { getAllowLan, getAppVersion, getServerHost, getServerPort } from "./config.js";
import { DismissedSet } from "./dismissed_set.js";
import { createMacCalendarSource } from "./mac_calendar.js";
import { startRefreshObservers } from "./refresh_observers.js";
import { getDisplaySettingsResponse, toTitlePolicy } from "./settings.js";
import { StatusBarController } from "./status_bar.js";
import type { CalendarSource } from "./types.js";
import type { PluginCommand } from "./xbar_render.js";

export type DaemonOptions = {
  pluginCommand: PluginCommand;
  source?: CalendarSource;
  openUrl?: UrlOpener;
};

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Runs until a quit action or a signal arrives; resolves with the exit code. */
export async function runDaemon(options: DaemonOptions): Promise<number> {
  const settingsResponse = getDisplaySettingsResponse();
  const settings = settingsResponse.effective;
  const source =
    options.source ??
    createMacCalendarSource({ permissionTimeoutMs: settings.permission_timeout_seconds * 1000 });

  if (!(await source.requestAccess())) {
    console.error(CALENDAR_PRIVACY_HINT);
    return 1;
  }

  const dismissed = new DismissedSet();
  const controller = new StatusBarController(source, dismissed, {
    policy: toTitlePolicy(settings),
  });
  const initial = await controller.refresh("startup");
  console.log(`[daemon] ${initial.event_count} events loaded; title "${initial.title}"`);

  const host = getServerHost();
  const port = getServerPort();

  return new Promise<number>((resolve) => {
    let stopping = false;
    const shutdown = (reason: string) => {
      if (stopping) return;
      stopping = true;
      console.log(`[daemon] shutting down (${reason})`);
      observers.stop();
      closeServer(server).then(
        () => resolve(0),
        (err: unknown) => {
          console.error(`[daemon] failed to close server: ${describeError(err)}`);
          resolve(1);
        }
      );
    };

    const app = createApp({
      controller,
      openUrl: options.openUrl ?? openWithMacOs,
      requestQuit: () => setImmediate(() => shutdown("quit requested")),
      pluginCommand: options.pluginCommand,
      settings: settingsResponse,
      version: getAppVersion(),
      allowLan: getAllowLan(),
    });

    const observers = startRefreshObservers({
      intervalMs: settings.refresh_interval_seconds * 1000,
      onNotification: (notification) => {
        controller.refresh(notification).catch((err: unknown) => {
          console.error(`[daemon] refresh failed: ${describeError(err)}`);
        });
      },
    });

    const server = app.listen(port, host, () => {
      console.log(`[daemon] Eventually listening on http://${host}:${port}`);
    });
    server.on("error", (err) => {
      console.error(`[daemon] server error: ${describeError(err)}`);
      observers.stop();
      resolve(1);
    });

    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });
}
