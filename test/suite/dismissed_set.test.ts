import * as assert from "assert";
import * as sinon from "sinon";
import { DismissedSet } from "../../server/dismissed_set.js";

suite("Dismissed Set Test Suite", () => {
  let warn: sinon.SinonStub;

  setup(() => {
    warn = sinon.stub(console, "warn");
  });

  teardown(() => {
    sinon.restore();
  });

  test("dismiss() reports whether the key was new", () => {
    const set = new DismissedSet();
    assert.deepStrictEqual(set.dismiss("a|||1"), { ok: true, data: true });
    assert.deepStrictEqual(set.dismiss("a|||1"), { ok: true, data: false });
    assert.strictEqual(set.size, 1);
    assert.strictEqual(set.has("a|||1"), true);
    assert.strictEqual(set.has("a|||2"), false);
  });

  test("snapshot() is a copy", () => {
    const set = new DismissedSet();
    set.dismiss("a|||1");
    const snapshot = set.snapshot();
    set.dismiss("b|||2");
    assert.deepStrictEqual([...snapshot], ["a|||1"]);
    assert.strictEqual(set.size, 2);
  });

  test("a throwing critical section poisons the set", () => {
    const set = new DismissedSet();
    set.dismiss("a|||1");
    const failed = set.withLock(() => {
      throw new Error("boom");
    });
    assert.strictEqual(failed.ok, false);
    if (!failed.ok) {
      assert.strictEqual(failed.error.code, "lock_poisoned");
      assert.strictEqual(failed.error.message, "Dismissed events lock poisoned: boom");
    }

    const again = set.dismiss("b|||2");
    assert.strictEqual(again.ok, false);
    if (!again.ok) assert.strictEqual(again.error.message, "Dismissed events lock is poisoned.");
  });

  test("reads on a poisoned set degrade to empty", () => {
    const set = new DismissedSet();
    set.dismiss("a|||1");
    set.withLock(() => {
      throw new Error("boom");
    });
    assert.strictEqual(set.snapshot().size, 0);
    assert.strictEqual(set.has("a|||1"), false);
    assert.strictEqual(set.size, 0);
    sinon.assert.calledWith(warn, "[dismissed] treating as empty: Dismissed events lock is poisoned.");
  });
});
