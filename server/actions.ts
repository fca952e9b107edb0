import { execFile } from "child_process";
import { z } from "zod";
import { CalendarError, describeError } from "./calendar_errors.js";
import type { StatusBarController } from "./status_bar.js";
import type { ActionResult, StatusSnapshot, UiAction } from "./types.js";

export const UiActionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("open_event"),
    eventId: z.string(),
    hasRecurrence: z.boolean(),
  }),
  z.object({ kind: z.literal("open_url"), url: z.string().min(1) }),
  z.object({ kind: z.literal("dismiss"), occurrenceKey: z.string().min(1) }),
  z.object({ kind: z.literal("quit") }),
]);

export type UrlOpener = (url: string) => Promise<void>;

export type ActionDeps = {
  controller: StatusBarController;
  openUrl: UrlOpener;
  requestQuit: () => void;
};

export type ActionOutcome = {
  kind: UiAction["kind"];
  opened?: string;
  snapshot?: StatusSnapshot;
};

export function parseAction(value: unknown): ActionResult<UiAction> {
  const parsed = UiActionSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `\`${issue.path.join(".")}\`: ` : "";
    return { ok: false, status: 400, error: `Invalid action: ${where}${issue?.message ?? "unknown"}` };
  }
  return { ok: true, data: parsed.data };
}

export function encodeAction(action: UiAction): string {
  return Buffer.from(JSON.stringify(action), "utf8").toString("base64url");
}

export function decodeAction(payload: string): ActionResult<UiAction> {
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(payload.trim(), "base64url").toString("utf8"));
  } catch {
    return { ok: false, status: 400, error: "Action payload is not valid base64url JSON." };
  }
  return parseAction(value);
}

/** Recurring events cannot be addressed by identifier, so they open the app itself. */
export function calendarUrlFor(eventId: string, hasRecurrence: boolean): string {
  return hasRecurrence ? "ical://" : `ical://ekevent/${eventId}`;
}

/** Team and channel ids from a Slack `/huddle/{team}/{channel}` link. */
export function extractSlackHuddleIds(url: string): { team: string; channel: string } | null {
  if (!url.includes("/huddle/")) return null;
  const parts = url.split("/");
  const index = parts.indexOf("huddle");
  if (index < 0 || index + 2 >= parts.length) return null;
  return { team: parts[index + 1], channel: parts[index + 2] };
}

/** Slack huddle links open the desktop client directly; anything else is unchanged. */
export function meetingLaunchUrl(url: string): string {
  if (!url.includes("slack")) return url;
  const ids = extractSlackHuddleIds(url);
  return ids ? `slack://join-huddle?team=${ids.team}&id=${ids.channel}` : url;
}

export function buildUrl(raw: string): { ok: true; url: string } | { ok: false; error: CalendarError } {
  try {
    return { ok: true, url: new URL(raw).href };
  } catch (err) {
    return {
      ok: false,
      error: new CalendarError("url_construction_failed", `Cannot build URL from "${raw}".`, {
        cause: describeError(err),
      }),
    };
  }
}

export const openWithMacOs: UrlOpener = (url) =>
  new Promise((resolve, reject) => {
    execFile("open", [url], (error, _stdout, stderr) => {
      if (error) {
        reject(new Error(stderr.trim() || error.message));
        return;
      }
      resolve();
    });
  });

async function openTarget(
  kind: UiAction["kind"],
  raw: string,
  deps: ActionDeps
): Promise<ActionResult<ActionOutcome>> {
  const built = buildUrl(raw);
  if (!built.ok) {
    console.warn(`[actions] ${built.error.message}`);
    return { ok: false, status: 422, error: built.error.message };
  }
  try {
    await deps.openUrl(built.url);
  } catch (err) {
    const message = `Failed to open ${built.url}: ${describeError(err)}`;
    console.error(`[actions] ${message}`);
    return { ok: false, status: 500, error: message };
  }
  return { ok: true, data: { kind, opened: built.url } };
}

export async function dispatchAction(
  action: UiAction,
  deps: ActionDeps
): Promise<ActionResult<ActionOutcome>> {
  switch (action.kind) {
    case "open_event":
      return openTarget(action.kind, calendarUrlFor(action.eventId, action.hasRecurrence), deps);
    case "open_url":
      return openTarget(action.kind, meetingLaunchUrl(action.url), deps);
    case "dismiss": {
      const snapshot = await deps.controller.dismiss(action.occurrenceKey);
      return { ok: true, data: { kind: action.kind, snapshot } };
    }
    case "quit":
      deps.requestQuit();
      return { ok: true, data: { kind: action.kind } };
  }
}
