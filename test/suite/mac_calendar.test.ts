import * as assert from "assert";
import * as sinon from "sinon";
import { CalendarError } from "../../server/calendar_errors.js";
import { EventCollection, fetchWindow } from "../../server/calendar_events.js";
import {
  buildEventsScript,
  createMacCalendarSource,
  mapScriptError,
  parseEventsPayload,
  type ScriptResult,
} from "../../server/mac_calendar.js";
import { buildMenu } from "../../server/menu_builder.js";
import { at, NOW } from "../helpers.js";

const DENIED = "execution error: Error: Not authorized to read calendar events. (-2700)";

function runner(result: ScriptResult) {
  return sinon.stub<[string, AbortSignal?], Promise<ScriptResult>>().resolves(result);
}

suite("Mac Calendar Test Suite", () => {
  let warn: sinon.SinonStub;

  setup(() => {
    warn = sinon.stub(console, "warn");
  });

  teardown(() => {
    sinon.restore();
  });

  test("buildEventsScript() passes the window as local dates", () => {
    const script = buildEventsScript(fetchWindow(NOW));
    assert.ok(script.includes("const startDate = makeDate(2026, 10, 19, 0);"));
    assert.ok(script.includes("const endDate = makeDate(2026, 10, 23, 86399);"));
  });

  test("buildEventsScript() expands occurrences through EventKit", () => {
    const script = buildEventsScript(fetchWindow(NOW));
    assert.ok(script.includes('ObjC.import("EventKit");'));
    assert.ok(script.includes("store.predicateForEventsWithStartDateEndDateCalendars(startDate, endDate, calendars)"));
    assert.ok(script.includes("store.eventsMatchingPredicate(predicate)"));
  });

  test("buildEventsScript() serializes with JSON.stringify", () => {
    assert.ok(buildEventsScript(fetchWindow(NOW)).includes("return JSON.stringify(events);"));
  });

  test("parseEventsPayload() maps script output to raw events", () => {
    const events = parseEventsPayload([
      {
        title: "Standup",
        uid: "E1",
        start: [2026, 10, 19, 35400],
        end: [2026, 10, 19, 37200],
        location: "https://acme.zoom.us/j/1",
        recurring: true,
        color: [1, 0, 0.25],
      },
      { title: "Lunch", uid: "", start: [2026, 10, 19, 43200], end: [2026, 10, 19, 46800], location: "", color: null },
    ]);
    assert.deepStrictEqual(events, [
      {
        title: "Standup",
        start: at(19, 9, 50),
        end: at(19, 10, 20),
        eventId: "E1",
        location: "https://acme.zoom.us/j/1",
        hasRecurrence: true,
        calendarColor: [1, 0, 0.25],
      },
      {
        title: "Lunch",
        start: at(19, 12),
        end: at(19, 13),
        eventId: null,
        location: null,
        hasRecurrence: false,
        calendarColor: null,
      },
    ]);
  });

  test("parseEventsPayload() clamps colour channels", () => {
    const [event] = parseEventsPayload([
      { title: "Bright", start: [2026, 10, 19, 0], end: [2026, 10, 19, 60], color: [1.2, -0.1, 0.5] },
    ]);
    assert.deepStrictEqual(event?.calendarColor, [1, 0, 0.5]);
  });

  test("locations keep their surrounding whitespace", () => {
    const raw = parseEventsPayload([
      {
        title: "Standup",
        uid: "E1",
        start: [2026, 10, 19, 35400],
        end: [2026, 10, 19, 37200],
        location: " https://zoom.us/j/1",
      },
    ]);
    assert.strictEqual(raw[0]?.location, " https://zoom.us/j/1");

    const rows = buildMenu(EventCollection.fromRaw(raw), new Set(), NOW);
    const first = rows[0];
    assert.ok(first && first.kind === "item");
    assert.strictEqual(first.label, "Open in Calendar");
  });

  test("parseEventsPayload() skips malformed entries", () => {
    assert.deepStrictEqual(parseEventsPayload({ events: [] }), []);
    assert.deepStrictEqual(
      parseEventsPayload([null, "event", { title: "No dates" }, { title: "Bad", start: [2026, 10], end: [2026, 10, 19, 0] }]),
      []
    );
  });

  test("mapScriptError() separates permission problems", () => {
    assert.strictEqual(mapScriptError(DENIED).code, "access_denied");
    const other = mapScriptError("execution error: Error: Connection is invalid.");
    assert.strictEqual(other.code, "store_unavailable");
    assert.strictEqual(other.message, "Calendar event store unavailable: execution error: Error: Connection is invalid.");
  });

  test("requestAccess() is granted only on an explicit answer", async () => {
    assert.strictEqual(
      await createMacCalendarSource({ runScript: runner({ ok: true, stdout: "granted" }) }).requestAccess(),
      true
    );
    assert.strictEqual(
      await createMacCalendarSource({ runScript: runner({ ok: true, stdout: "denied" }) }).requestAccess(),
      false
    );
    sinon.assert.calledWith(warn, "[calendar] calendar access was not granted");
    assert.strictEqual(await createMacCalendarSource({ runScript: runner({ ok: false, error: DENIED }) }).requestAccess(), false);
    sinon.assert.calledWith(warn, `[calendar] Calendar access denied: ${DENIED}`);
  });

  test("requestAccess() gives up after the permission timeout and stops the script", async () => {
    const pending = sinon
      .stub<[string, AbortSignal?], Promise<ScriptResult>>()
      .returns(new Promise<ScriptResult>(() => undefined));
    const source = createMacCalendarSource({ runScript: pending, permissionTimeoutMs: 5 });
    assert.strictEqual(await source.requestAccess(), false);
    sinon.assert.calledWith(warn, "[calendar] permission request timed out after 5ms");
    const signal = pending.firstCall.args[1];
    assert.ok(signal);
    assert.strictEqual(signal.aborted, true);
  });

  test("requestAccess() leaves the script alone when it answers in time", async () => {
    const runScript = runner({ ok: true, stdout: "granted" });
    await createMacCalendarSource({ runScript, permissionTimeoutMs: 1_000 }).requestAccess();
    assert.strictEqual(runScript.firstCall.args[1]?.aborted, false);
  });

  test("fetchEvents() parses the script output", async () => {
    const stdout = JSON.stringify([{ title: "Review", uid: "E2", start: [2026, 10, 19, 39600], end: [2026, 10, 19, 43200] }]);
    const runScript = runner({ ok: true, stdout });
    const events = await createMacCalendarSource({ runScript }).fetchEvents(fetchWindow(NOW));
    assert.strictEqual(events.length, 1);
    assert.strictEqual(events[0]?.start.getTime(), at(19, 11).getTime());
  });

  test("fetchEvents() keeps control characters inside titles", async () => {
    const stdout = JSON.stringify([
      { title: "Plan\tning\u0001", uid: "E3", start: [2026, 10, 19, 39600], end: [2026, 10, 19, 43200] },
    ]);
    assert.ok(stdout.includes("Plan\\tning\\u0001"));
    const events = await createMacCalendarSource({ runScript: runner({ ok: true, stdout }) }).fetchEvents(fetchWindow(NOW));
    assert.strictEqual(events[0]?.title, "Plan\tning\u0001");
  });

  test("fetchEvents() treats empty output as no events", async () => {
    const source = createMacCalendarSource({ runScript: runner({ ok: true, stdout: "" }) });
    assert.deepStrictEqual(await source.fetchEvents(fetchWindow(NOW)), []);
  });

  test("fetchEvents() surfaces calendar errors", async () => {
    const denied = createMacCalendarSource({ runScript: runner({ ok: false, error: DENIED }) });
    await assert.rejects(
      denied.fetchEvents(fetchWindow(NOW)),
      (err: unknown) => err instanceof CalendarError && err.code === "access_denied"
    );

    const garbled = createMacCalendarSource({ runScript: runner({ ok: true, stdout: "{not json" }) });
    await assert.rejects(garbled.fetchEvents(fetchWindow(NOW)), {
      name: "CalendarError",
      message: "Calendar returned malformed event data.",
    });
  });
});
