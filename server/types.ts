export type RgbColor = readonly [red: number, green: number, blue: number];

export type EventInfo = Readonly<{
  title: string;
  start: Date;
  end: Date;
  eventId: string;
  // eventId plus start seconds; recurring instances share one eventId.
  occurrenceKey: string;
  hasRecurrence: boolean;
  location: string | null;
  calendarColor: RgbColor;
}>;

export type EventStatus =
  | { kind: "current"; event: EventInfo }
  | { kind: "upcoming"; event: EventInfo };

export type RawCalendarEvent = {
  title: string;
  start: Date;
  end: Date;
  eventId: string | null;
  location: string | null;
  hasRecurrence: boolean;
  calendarColor: RgbColor | null;
};

export type DateRange = {
  start: Date;
  end: Date;
};

export type CalendarSource = {
  requestAccess(): Promise<boolean>;
  fetchEvents(range: DateRange): Promise<RawCalendarEvent[]>;
};

export const SERVICE_KINDS = [
  "slack",
  "zoom",
  "google_meet",
  "microsoft_teams",
  "generic",
] as const;
export type ServiceKind = (typeof SERVICE_KINDS)[number];

export type ServiceInfo = Readonly<{
  kind: ServiceKind;
  name: string;
  icon: string;
}>;

export type UiAction =
  | { kind: "open_event"; eventId: string; hasRecurrence: boolean }
  | { kind: "open_url"; url: string }
  | { kind: "dismiss"; occurrenceKey: string }
  | { kind: "quit" };

export type MenuItemRow = {
  kind: "item";
  label: string;
  icon: string | null;
  color: RgbColor | null;
  bold: boolean;
  dimmed: boolean;
  disabled: boolean;
  action: UiAction | null;
  shortcut: string | null;
  // Code point offsets [from, to) of a label span shown in a secondary tone.
  mutedRange: readonly [from: number, to: number] | null;
};

export type MenuRow = { kind: "separator" } | MenuItemRow;

export type RefreshReason =
  | "startup"
  | "calendar_changed"
  | "system_wake"
  | "dismissed"
  | "manual";

export type StatusSnapshot = {
  title: string;
  rows: MenuRow[];
  event_count: number;
  dismissed_count: number;
  reason: RefreshReason;
  refreshed_at: string;
};

export type ActionResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number; error: string };
