import {
  addLocalDays,
  startOfLocalDay,
  type EventCollection,
} from "./calendar_events.js";
import { charCount, dayLabel, formatDayDate, formatTime, isAllDay } from "./formatting.js";
import { serviceForLocation } from "./service_detection.js";
import type { EventInfo, EventStatus, MenuItemRow, MenuRow } from "./types.js";

const DAY_GROUPS = 4;
const SEPARATOR: MenuRow = { kind: "separator" };

function item(label: string, fields: Partial<Omit<MenuItemRow, "kind" | "label">> = {}): MenuItemRow {
  return {
    kind: "item",
    label,
    icon: fields.icon ?? null,
    color: fields.color ?? null,
    bold: fields.bold ?? false,
    dimmed: fields.dimmed ?? false,
    disabled: fields.disabled ?? false,
    action: fields.action ?? null,
    shortcut: fields.shortcut ?? null,
    mutedRange: fields.mutedRange ?? null,
  };
}

function quickActionRows(event: EventInfo): MenuItemRow[] {
  const rows: MenuItemRow[] = [];
  const link = serviceForLocation(event.location);
  if (link) {
    rows.push(
      item(`Join ${link.service.name} Event`, {
        icon: link.service.icon,
        action: { kind: "open_url", url: link.url },
      })
    );
  }
  rows.push(
    item("Open in Calendar", {
      icon: "calendar",
      action: { kind: "open_event", eventId: event.eventId, hasRecurrence: event.hasRecurrence },
    })
  );
  rows.push(
    item("Dismiss Event", {
      icon: "circle-x",
      action: { kind: "dismiss", occurrenceKey: event.occurrenceKey },
    })
  );
  return rows;
}

/** Where the "- HH:MM" end time sits in a timed row's label. */
export function endTimeRange(event: EventInfo): readonly [number, number] | null {
  if (isAllDay(event.start, event.end)) return null;
  const from = charCount(formatTime(event.start)) + 1;
  return [from, from + 2 + charCount(formatTime(event.end))];
}

export function eventRowLabel(event: EventInfo): string {
  const prefix = isAllDay(event.start, event.end)
    ? "All day:"
    : `${formatTime(event.start)} - ${formatTime(event.end)}`;
  return `${prefix} ${event.title}`;
}

function eventRow(
  event: EventInfo,
  highlighted: EventStatus | null,
  dismissed: ReadonlySet<string>,
  now: Date
): MenuItemRow {
  const isHighlighted = highlighted?.event.occurrenceKey === event.occurrenceKey;
  const isPast = event.end.getTime() < now.getTime();
  return item(eventRowLabel(event), {
    icon: "circle",
    color: event.calendarColor,
    bold: isHighlighted,
    dimmed: isPast || dismissed.has(event.occurrenceKey),
    action: { kind: "open_event", eventId: event.eventId, hasRecurrence: event.hasRecurrence },
    mutedRange: endTimeRange(event),
  });
}

function dayGroupRows(
  collection: EventCollection,
  highlighted: EventStatus | null,
  dismissed: ReadonlySet<string>,
  now: Date
): MenuRow[] {
  const rows: MenuRow[] = [];
  const today = startOfLocalDay(now);
  for (let offset = 0; offset < DAY_GROUPS; offset += 1) {
    const day = addLocalDays(today, offset);
    const events = collection.eventsOn(day);
    if (events.length === 0) continue;
    rows.push(item(`${dayLabel(day, offset)}, ${formatDayDate(day)}`, { bold: true, disabled: true }));
    for (const event of events) {
      rows.push(eventRow(event, highlighted, dismissed, now));
    }
    rows.push(SEPARATOR);
  }
  return rows;
}

export function buildMenu(
  collection: EventCollection,
  dismissed: ReadonlySet<string>,
  now: Date = new Date()
): MenuRow[] {
  const rows: MenuRow[] = [];
  const highlighted = collection.findCurrentOrNext(dismissed, now);

  if (highlighted) {
    rows.push(...quickActionRows(highlighted.event), SEPARATOR);
  }

  if (collection.isEmpty()) {
    rows.push(item("No events", { disabled: true }));
  } else {
    rows.push(...dayGroupRows(collection, highlighted, dismissed, now));
  }

  rows.push(item("Quit", { action: { kind: "quit" }, shortcut: "q" }));
  return rows;
}
