import { CalendarError } from "./calendar_errors.js";

// SF Symbol names understood by SwiftBar's `sfimage` parameter.
const ICON_SYMBOLS: Readonly<Record<string, string>> = {
  calendar: "calendar",
  "circle-x": "xmark.circle",
  circle: "circle.fill",
  google: "video.fill",
  slack: "headphones",
  teams: "person.2.fill",
  zoom: "video.circle",
  video: "video",
};

const reportedMissing = new Set<string>();

export function lookupIcon(key: string): { ok: true; symbol: string } | { ok: false; error: CalendarError } {
  const symbol = ICON_SYMBOLS[key];
  if (symbol) return { ok: true, symbol };
  return {
    ok: false,
    error: new CalendarError("icon_missing", `Unknown icon requested: ${key}`, { key }),
  };
}

/** Missing icons are logged once per key and rendered without an image. */
export function resolveIcon(key: string | null): string | null {
  if (!key) return null;
  const result = lookupIcon(key);
  if (result.ok) return result.symbol;
  if (!reportedMissing.has(key)) {
    reportedMissing.add(key);
    console.warn(`[icons] ${result.error.message}`);
  }
  return null;
}
