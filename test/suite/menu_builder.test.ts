import * as assert from "assert";
import { EventCollection } from "../../server/calendar_events.js";
import { buildMenu, endTimeRange, eventRowLabel } from "../../server/menu_builder.js";
import type { MenuItemRow, MenuRow } from "../../server/types.js";
import { at, event, minutesFromNow, NOW } from "../helpers.js";

const NONE: ReadonlySet<string> = new Set();

function labels(rows: MenuRow[]): string[] {
  return rows.map((row) => (row.kind === "separator" ? "---" : row.label));
}

function itemAt(rows: MenuRow[], index: number): MenuItemRow {
  const row = rows[index];
  assert.ok(row && row.kind === "item", `row ${index} is not an item`);
  return row;
}

suite("Menu Builder Test Suite", () => {
  const breakfast = event({ title: "Breakfast", start: at(19, 8), end: at(19, 9) });
  const standup = event({
    title: "Standup",
    start: minutesFromNow(-10),
    end: minutesFromNow(20),
    location: "https://acme.zoom.us/j/1",
    calendarColor: [1, 0, 0.5],
  });
  const offsite = event({ title: "Offsite", start: at(20, 0), end: at(20, 23, 59, 59) });
  const review = event({ title: "Review", start: at(22, 14), end: at(22, 15) });
  const collection = new EventCollection([review, offsite, standup, breakfast]);

  test("eventRowLabel() shows the time range or an all-day prefix", () => {
    assert.strictEqual(eventRowLabel(breakfast), "08:00 - 09:00 Breakfast");
    assert.strictEqual(eventRowLabel(offsite), "All day: Offsite");
  });

  test("endTimeRange() covers the dash and end time of timed rows", () => {
    assert.deepStrictEqual(endTimeRange(breakfast), [6, 13]);
    assert.strictEqual(Array.from(eventRowLabel(breakfast)).slice(6, 13).join(""), "- 09:00");
    assert.strictEqual(endTimeRange(offsite), null);
  });

  test("quick actions, day groups and quit appear in order", () => {
    const rows = buildMenu(collection, NONE, NOW);
    assert.deepStrictEqual(labels(rows), [
      "Join Zoom Event",
      "Open in Calendar",
      "Dismiss Event",
      "---",
      "Today, 19 Oct",
      "08:00 - 09:00 Breakfast",
      "09:50 - 10:20 Standup",
      "---",
      "Tomorrow, 20 Oct",
      "All day: Offsite",
      "---",
      "Thursday, 22 Oct",
      "14:00 - 15:00 Review",
      "---",
      "Quit",
    ]);
  });

  test("quick actions target the highlighted event", () => {
    const rows = buildMenu(collection, NONE, NOW);
    assert.deepStrictEqual(itemAt(rows, 0).action, { kind: "open_url", url: "https://acme.zoom.us/j/1" });
    assert.strictEqual(itemAt(rows, 0).icon, "zoom");
    assert.deepStrictEqual(itemAt(rows, 1).action, {
      kind: "open_event",
      eventId: "id-standup",
      hasRecurrence: false,
    });
    assert.strictEqual(itemAt(rows, 1).icon, "calendar");
    assert.deepStrictEqual(itemAt(rows, 2).action, { kind: "dismiss", occurrenceKey: standup.occurrenceKey });
    assert.strictEqual(itemAt(rows, 2).icon, "circle-x");
  });

  test("event rows carry emphasis and calendar colour", () => {
    const rows = buildMenu(collection, NONE, NOW);
    const header = itemAt(rows, 4);
    assert.strictEqual(header.bold, true);
    assert.strictEqual(header.disabled, true);

    const past = itemAt(rows, 5);
    assert.strictEqual(past.dimmed, true);
    assert.strictEqual(past.bold, false);

    const current = itemAt(rows, 6);
    assert.strictEqual(current.bold, true);
    assert.strictEqual(current.dimmed, false);
    assert.strictEqual(current.icon, "circle");
    assert.deepStrictEqual(current.color, [1, 0, 0.5]);
    assert.deepStrictEqual(current.mutedRange, [6, 13]);
    assert.strictEqual(itemAt(rows, 9).mutedRange, null);
    assert.strictEqual(header.mutedRange, null);

    const quit = itemAt(rows, 14);
    assert.deepStrictEqual(quit.action, { kind: "quit" });
    assert.strictEqual(quit.shortcut, "q");
  });

  test("a link-less event offers no join action", () => {
    const rows = buildMenu(new EventCollection([review]), NONE, at(22, 13));
    assert.deepStrictEqual(labels(rows).slice(0, 4), ["Open in Calendar", "Dismiss Event", "---", "Today, 22 Oct"]);
  });

  test("dismissed events are dimmed and lose their quick actions", () => {
    const rows = buildMenu(collection, new Set([standup.occurrenceKey]), NOW);
    assert.deepStrictEqual(labels(rows).slice(0, 4), [
      "Today, 19 Oct",
      "08:00 - 09:00 Breakfast",
      "09:50 - 10:20 Standup",
      "---",
    ]);
    const dismissedRow = itemAt(rows, 2);
    assert.strictEqual(dismissedRow.dimmed, true);
    assert.strictEqual(dismissedRow.bold, false);
    assert.strictEqual(rows.length, 11);
  });

  test("an empty collection shows a disabled placeholder", () => {
    const rows = buildMenu(EventCollection.empty(), NONE, NOW);
    assert.deepStrictEqual(labels(rows), ["No events", "Quit"]);
    assert.strictEqual(itemAt(rows, 0).disabled, true);
  });

  test("events past the fourth day are not listed", () => {
    const later = new EventCollection([event({ title: "Retro", start: at(24, 10), end: at(24, 11) })]);
    assert.deepStrictEqual(labels(buildMenu(later, NONE, NOW)), ["Quit"]);
  });
});
