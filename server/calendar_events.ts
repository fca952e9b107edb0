import {
  DEFAULT_TITLE_POLICY,
  formatEventTitle,
  type TitlePolicy,
} from "./formatting.js";
import type {
  DateRange,
  EventInfo,
  EventStatus,
  RawCalendarEvent,
  RgbColor,
} from "./types.js";

export const DAYS_TO_FETCH = 4;
export const DEFAULT_CALENDAR_COLOR: RgbColor = [0.5, 0.5, 0.5];

export const NO_EVENTS_TODAY = "No events today";
export const NO_MORE_EVENTS_TODAY = "No more events today";

export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addLocalDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

export function isSameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

/** Local midnight today through 23:59:59 on the last look-ahead day. */
export function fetchWindow(now: Date): DateRange {
  const start = startOfLocalDay(now);
  const lastDay = addLocalDays(start, DAYS_TO_FETCH);
  const end = new Date(
    lastDay.getFullYear(),
    lastDay.getMonth(),
    lastDay.getDate(),
    23,
    59,
    59
  );
  return { start, end };
}

export function occurrenceKey(eventId: string, start: Date): string {
  return `${eventId}|||${Math.trunc(start.getTime() / 1000)}`;
}

export function toEventInfo(raw: RawCalendarEvent): EventInfo {
  const eventId = raw.eventId ?? "";
  return Object.freeze({
    title: raw.title,
    start: new Date(raw.start.getTime()),
    end: new Date(raw.end.getTime()),
    eventId,
    occurrenceKey: occurrenceKey(eventId, raw.start),
    hasRecurrence: raw.hasRecurrence,
    location: raw.location,
    calendarColor: raw.calendarColor ?? DEFAULT_CALENDAR_COLOR,
  });
}

export class EventCollection {
  private readonly events: readonly EventInfo[];

  constructor(events: readonly EventInfo[]) {
    // Array.prototype.sort is stable, so equal starts keep fetch order.
    this.events = Object.freeze(
      [...events].sort((a, b) => a.start.getTime() - b.start.getTime())
    );
  }

  static fromRaw(raw: readonly RawCalendarEvent[]): EventCollection {
    return new EventCollection(raw.map(toEventInfo));
  }

  static empty(): EventCollection {
    return new EventCollection([]);
  }

  get size(): number {
    return this.events.length;
  }

  isEmpty(): boolean {
    return this.events.length === 0;
  }

  toArray(): readonly EventInfo[] {
    return this.events;
  }

  eventsOn(day: Date): EventInfo[] {
    return this.events.filter((event) => isSameLocalDay(event.start, day));
  }

  findCurrentOrNext(dismissed: ReadonlySet<string>, now: Date = new Date()): EventStatus | null {
    const nowMs = now.getTime();
    let upcoming: EventStatus | null = null;

    for (const event of this.events) {
      if (!isSameLocalDay(event.start, now)) continue;
      if (dismissed.has(event.occurrenceKey)) continue;
      const startMs = event.start.getTime();
      if (startMs <= nowMs && nowMs <= event.end.getTime()) {
        return { kind: "current", event };
      }
      if (!upcoming && startMs > nowMs) {
        upcoming = { kind: "upcoming", event };
      }
    }

    return upcoming;
  }

  statusBarTitle(
    dismissed: ReadonlySet<string>,
    now: Date = new Date(),
    policy: TitlePolicy = DEFAULT_TITLE_POLICY
  ): string {
    const status = this.findCurrentOrNext(dismissed, now);
    if (status?.kind === "current") {
      const remaining = status.event.end.getTime() - now.getTime();
      return formatEventTitle(status.event.title, remaining, "current", policy);
    }
    if (status?.kind === "upcoming") {
      const until = status.event.start.getTime() - now.getTime();
      return formatEventTitle(status.event.title, until, "upcoming", policy);
    }
    return this.eventsOn(now).length > 0 ? NO_MORE_EVENTS_TODAY : NO_EVENTS_TODAY;
  }
}
