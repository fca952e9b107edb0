import express, { type Express } from "express";
import { dispatchAction, parseAction, type UrlOpener } from "./actions.js";
import type { DisplaySettingsResponse } from "./settings.js";
import type { StatusBarController } from "./status_bar.js";
import { renderXbar, type PluginCommand } from "./xbar_render.js";

export type AppOptions = {
  controller: StatusBarController;
  openUrl: UrlOpener;
  requestQuit: () => void;
  pluginCommand: PluginCommand;
  settings: DisplaySettingsResponse;
  version: string;
  allowLan?: boolean;
};

export function isLoopbackAddress(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  if (normalized === "::1" || normalized === "0:0:0:0:0:0:0:1") return true;
  if (normalized.startsWith("::ffff:")) {
    return normalized.slice("::ffff:".length).startsWith("127.");
  }
  return normalized.startsWith("127.");
}

export function createApp(options: AppOptions): Express {
  const { controller } = options;
  const app = express();

  app.use((req, res, next) => {
    if (options.allowLan) return next();
    if (isLoopbackAddress(req.socket.remoteAddress)) return next();
    return res.status(403).json({
      error: "forbidden",
      message: "Eventually only accepts loopback clients.",
      hint: "Set EVENTUALLY_ALLOW_LAN=1 to allow remote clients.",
    });
  });
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true, ts: new Date().toISOString(), version: options.version });
  });

  app.get("/status", (_req, res) => {
    res.json({ title: controller.current().title });
  });

  app.get("/settings", (_req, res) => {
    res.json(options.settings);
  });

  app.get("/menu", (_req, res) => {
    res.json(controller.current());
  });

  app.get("/menu.xbar", (_req, res) => {
    const snapshot = controller.current();
    res.type("text/plain").send(renderXbar(snapshot.title, snapshot.rows, options.pluginCommand));
  });

  app.post("/refresh", async (_req, res) => {
    const snapshot = await controller.refresh("manual");
    return res.json(snapshot);
  });

  app.post("/actions", async (req, res) => {
    const parsed = parseAction(req.body ?? {});
    if (!parsed.ok) return res.status(parsed.status).json({ error: parsed.error });
    const result = await dispatchAction(parsed.data, {
      controller,
      openUrl: options.openUrl,
      requestQuit: options.requestQuit,
    });
    if (!result.ok) return res.status(result.status).json({ error: result.error });
    return res.json(result.data);
  });

  return app;
}
