export type CalendarErrorCode =
  | "access_denied"
  | "store_unavailable"
  | "lock_poisoned"
  | "icon_missing"
  | "url_construction_failed";

export const CALENDAR_PRIVACY_HINT =
  "Calendar access denied. Please grant access in System Settings > Privacy & Security > Calendars";

export class CalendarError extends Error {
  code: CalendarErrorCode;
  details?: Record<string, unknown>;

  constructor(code: CalendarErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "CalendarError";
    this.code = code;
    this.details = details;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
