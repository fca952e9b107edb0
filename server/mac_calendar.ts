import { execFile } from "child_process";
import { CalendarError } from "./calendar_errors.js";
import type { CalendarSource, DateRange, RawCalendarEvent, RgbColor } from "./types.js";

export type ScriptResult = { ok: true; stdout: string } | { ok: false; error: string };
export type ScriptRunner = (script: string, signal?: AbortSignal) => Promise<ScriptResult>;

export type MacCalendarOptions = {
  runScript?: ScriptRunner;
  permissionTimeoutMs?: number;
};

const DEFAULT_PERMISSION_TIMEOUT_MS = 30_000;
const ACCESS_GRANTED = "granted";

// JavaScript for Automation, run by `osascript -l JavaScript`. EventKit expands
// recurring series into their occurrences; Calendar's scripting bridge does not.
const JXA_HELPERS = String.raw`
ObjC.import("EventKit");
ObjC.import("AppKit");

const EVENT_ENTITY = 0;
const STATUS_NOT_DETERMINED = 0;
const STATUS_AUTHORIZED = 3;

function authorizationStatus() {
  return $.EKEventStore.authorizationStatusForEntityType(EVENT_ENTITY);
}

function makeDate(year, month, day, seconds) {
  const local = new Date(year, month - 1, day, 0, 0, seconds);
  return $.NSDate.dateWithTimeIntervalSince1970(local.getTime() / 1000);
}

function localTuple(nsDate) {
  const date = new Date(nsDate.timeIntervalSince1970 * 1000);
  const seconds = date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
  return [date.getFullYear(), date.getMonth() + 1, date.getDate(), seconds];
}

function text(value) {
  const unwrapped = ObjC.unwrap(value);
  return typeof unwrapped === "string" ? unwrapped : null;
}

function colorOf(calendar) {
  const color = calendar.color;
  if (!color || color.isNil()) return null;
  const rgb = color.colorUsingColorSpace($.NSColorSpace.sRGBColorSpace);
  if (!rgb || rgb.isNil()) return null;
  return [rgb.redComponent, rgb.greenComponent, rgb.blueComponent];
}
`;

const ACCESS_SCRIPT = `
${JXA_HELPERS}
function run() {
  if (authorizationStatus() === STATUS_AUTHORIZED) return "${ACCESS_GRANTED}";
  if (authorizationStatus() !== STATUS_NOT_DETERMINED) return "denied";
  const store = $.EKEventStore.alloc.init;
  let answered = false;
  store.requestAccessToEntityTypeCompletion(EVENT_ENTITY, function () {
    answered = true;
  });
  while (!answered) {
    $.NSRunLoop.currentRunLoop.runUntilDate($.NSDate.dateWithTimeIntervalSinceNow(0.1));
  }
  return authorizationStatus() === STATUS_AUTHORIZED ? "${ACCESS_GRANTED}" : "denied";
}
`.trim();

function dateLiteral(date: Date): string {
  const seconds = date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
  return `makeDate(${date.getFullYear()}, ${date.getMonth() + 1}, ${date.getDate()}, ${seconds})`;
}

/**
 * Dates cross the bridge as local [year, month, day, seconds] tuples, and the
 * payload is serialized with JSON.stringify on the script side.
 */
export function buildEventsScript(range: DateRange): string {
  return `
${JXA_HELPERS}
function run() {
  if (authorizationStatus() !== STATUS_AUTHORIZED) {
    throw new Error("Not authorized to read calendar events.");
  }
  const store = $.EKEventStore.alloc.init;
  const calendars = store.calendarsForEntityType(EVENT_ENTITY);
  const startDate = ${dateLiteral(range.start)};
  const endDate = ${dateLiteral(range.end)};
  const predicate = store.predicateForEventsWithStartDateEndDateCalendars(startDate, endDate, calendars);
  const found = store.eventsMatchingPredicate(predicate);
  const events = [];
  for (let i = 0; i < found.count; i += 1) {
    const event = found.objectAtIndex(i);
    events.push({
      title: text(event.title) || "",
      uid: text(event.eventIdentifier),
      start: localTuple(event.startDate),
      end: localTuple(event.endDate),
      location: text(event.location),
      recurring: Boolean(event.hasRecurrenceRules),
      color: colorOf(event.calendar),
    });
  }
  return JSON.stringify(events);
}
`.trim();
}

export const execJxa: ScriptRunner = (script, signal) =>
  new Promise((resolve) => {
    execFile(
      "osascript",
      ["-l", "JavaScript", "-e", script],
      { maxBuffer: 5 * 1024 * 1024, signal },
      (error, stdout, stderr) => {
        if (error) {
          resolve({ ok: false, error: stderr.trim() || error.message || "osascript execution failed." });
          return;
        }
        resolve({ ok: true, stdout: stdout.trim() });
      }
    );
  });

/** Resolves with `fallback` when `pending` has not settled within `timeoutMs`. */
export function awaitOneShot<T>(
  pending: Promise<T>,
  timeoutMs: number,
  fallback: T,
  onTimeout?: () => void
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      resolve(fallback);
    }, timeoutMs);
    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

export function mapScriptError(message: string): CalendarError {
  const normalized = message.toLowerCase();
  if (normalized.includes("not authorized") || normalized.includes("not authorised")) {
    return new CalendarError("access_denied", `Calendar access denied: ${message}`);
  }
  return new CalendarError("store_unavailable", `Calendar event store unavailable: ${message}`);
}

function optionalId(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

// Kept verbatim: link detection checks the prefix on the untrimmed text.
function optionalText(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

function parseLocalDate(value: unknown): Date | null {
  if (!Array.isArray(value) || value.length !== 4) return null;
  const parts = value.map((part) => (typeof part === "number" ? part : Number(part)));
  if (!parts.every((part) => Number.isFinite(part))) return null;
  const [year, month, day, seconds] = parts;
  return new Date(year, month - 1, day, 0, 0, seconds);
}

function parseColor(value: unknown): RgbColor | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const channels = value.map((channel) => (typeof channel === "number" ? channel : Number(channel)));
  if (!channels.every((channel) => Number.isFinite(channel))) return null;
  const [red, green, blue] = channels.map((channel) => Math.min(1, Math.max(0, channel)));
  return [red, green, blue];
}

export function parseEventsPayload(payload: unknown): RawCalendarEvent[] {
  if (!Array.isArray(payload)) return [];
  const events: RawCalendarEvent[] = [];
  for (const entry of payload) {
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) continue;
    const record = entry as Record<string, unknown>;
    const start = parseLocalDate(record.start);
    const end = parseLocalDate(record.end);
    if (!start || !end) continue;
    events.push({
      title: typeof record.title === "string" ? record.title : "",
      start,
      end,
      eventId: optionalId(record.uid),
      location: optionalText(record.location),
      hasRecurrence: record.recurring === true,
      calendarColor: parseColor(record.color),
    });
  }
  return events;
}

export function createMacCalendarSource(options: MacCalendarOptions = {}): CalendarSource {
  const runScript = options.runScript ?? execJxa;
  const permissionTimeoutMs = options.permissionTimeoutMs ?? DEFAULT_PERMISSION_TIMEOUT_MS;

  return {
    async requestAccess(): Promise<boolean> {
      const controller = new AbortController();
      const outcome = await awaitOneShot<ScriptResult | "timeout">(
        runScript(ACCESS_SCRIPT, controller.signal),
        permissionTimeoutMs,
        "timeout",
        () => controller.abort()
      );
      if (outcome === "timeout") {
        console.warn(`[calendar] permission request timed out after ${permissionTimeoutMs}ms`);
        return false;
      }
      if (!outcome.ok) {
        console.warn(`[calendar] ${mapScriptError(outcome.error).message}`);
        return false;
      }
      if (outcome.stdout !== ACCESS_GRANTED) {
        console.warn("[calendar] calendar access was not granted");
        return false;
      }
      return true;
    },

    async fetchEvents(range: DateRange): Promise<RawCalendarEvent[]> {
      const result = await runScript(buildEventsScript(range));
      if (!result.ok) throw mapScriptError(result.error);
      let payload: unknown;
      try {
        payload = JSON.parse(result.stdout || "[]");
      } catch {
        throw new CalendarError("store_unavailable", "Calendar returned malformed event data.", {
          output: result.stdout.slice(0, 200),
        });
      }
      return parseEventsPayload(payload);
    },
  };
}
