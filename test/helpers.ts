import { toEventInfo } from "../server/calendar_events.js";
import type { CalendarSource, EventInfo, RawCalendarEvent } from "../server/types.js";

// Monday 19 October 2026, 10:00 local time.
export const NOW = new Date(2026, 9, 19, 10, 0, 0);

export function at(day: number, hours: number, minutes = 0, seconds = 0): Date {
  return new Date(2026, 9, day, hours, minutes, seconds);
}

export function minutesFromNow(minutes: number): Date {
  return new Date(NOW.getTime() + minutes * 60_000);
}

export function rawEvent(overrides: Partial<RawCalendarEvent> & Pick<RawCalendarEvent, "title" | "start" | "end">): RawCalendarEvent {
  return {
    eventId: `id-${overrides.title.toLowerCase().replace(/\s+/g, "-")}`,
    location: null,
    hasRecurrence: false,
    calendarColor: null,
    ...overrides,
  };
}

export function event(overrides: Partial<RawCalendarEvent> & Pick<RawCalendarEvent, "title" | "start" | "end">): EventInfo {
  return toEventInfo(rawEvent(overrides));
}

export function fakeSource(events: RawCalendarEvent[] = []): CalendarSource & { events: RawCalendarEvent[] } {
  return {
    events,
    async requestAccess() {
      return true;
    },
    async fetchEvents() {
      return this.events;
    },
  };
}
