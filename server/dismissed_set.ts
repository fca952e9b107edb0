import { CalendarError, describeError } from "./calendar_errors.js";

export type LockResult<T> = { ok: true; data: T } | { ok: false; error: CalendarError };

/**
 * Occurrence keys the user has dismissed this session. Entries are only ever
 * added and nothing is written to disk, so a restart clears the set.
 *
 * Every access goes through `withLock`; a critical section that throws
 * poisons the set and later reads degrade to "nothing dismissed".
 */
export class DismissedSet {
  private readonly keys = new Set<string>();
  private poisonedBy: string | null = null;

  withLock<T>(section: (keys: Set<string>) => T): LockResult<T> {
    if (this.poisonedBy !== null) {
      return {
        ok: false,
        error: new CalendarError("lock_poisoned", "Dismissed events lock is poisoned.", {
          cause: this.poisonedBy,
        }),
      };
    }
    try {
      return { ok: true, data: section(this.keys) };
    } catch (err) {
      this.poisonedBy = describeError(err);
      return {
        ok: false,
        error: new CalendarError(
          "lock_poisoned",
          `Dismissed events lock poisoned: ${this.poisonedBy}`
        ),
      };
    }
  }

  /** Returns false when the key was already dismissed. */
  dismiss(occurrenceKey: string): LockResult<boolean> {
    return this.withLock((keys) => {
      if (keys.has(occurrenceKey)) return false;
      keys.add(occurrenceKey);
      return true;
    });
  }

  snapshot(): ReadonlySet<string> {
    const result = this.withLock((keys) => new Set(keys));
    if (result.ok) return result.data;
    console.warn(`[dismissed] treating as empty: ${result.error.message}`);
    return new Set();
  }

  has(occurrenceKey: string): boolean {
    const result = this.withLock((keys) => keys.has(occurrenceKey));
    return result.ok ? result.data : false;
  }

  get size(): number {
    const result = this.withLock((keys) => keys.size);
    return result.ok ? result.data : 0;
  }
}
