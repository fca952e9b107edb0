import { describeError } from "./calendar_errors.js";
import { EventCollection, fetchWindow } from "./calendar_events.js";
import type { DismissedSet } from "./dismissed_set.js";
import { DEFAULT_TITLE_POLICY, type TitlePolicy } from "./formatting.js";
import { buildMenu } from "./menu_builder.js";
import type { CalendarSource, RefreshReason, StatusSnapshot } from "./types.js";

export type StatusBarOptions = {
  policy?: TitlePolicy;
  clock?: () => Date;
};

/**
 * Holds the latest rendered title and menu. Every refresh recomputes both
 * from scratch; when two refreshes overlap, the one requested last wins.
 */
export class StatusBarController {
  private readonly source: CalendarSource;
  private readonly dismissed: DismissedSet;
  private readonly policy: TitlePolicy;
  private readonly clock: () => Date;
  private collection = EventCollection.empty();
  private snapshot: StatusSnapshot;
  private requestedSeq = 0;
  private appliedSeq = 0;

  constructor(source: CalendarSource, dismissed: DismissedSet, options: StatusBarOptions = {}) {
    this.source = source;
    this.dismissed = dismissed;
    this.policy = options.policy ?? DEFAULT_TITLE_POLICY;
    this.clock = options.clock ?? (() => new Date());
    this.snapshot = this.render("startup");
  }

  current(): StatusSnapshot {
    return this.snapshot;
  }

  events(): EventCollection {
    return this.collection;
  }

  async refresh(reason: RefreshReason): Promise<StatusSnapshot> {
    const seq = ++this.requestedSeq;
    try {
      const raw = await this.source.fetchEvents(fetchWindow(this.clock()));
      if (seq < this.appliedSeq) return this.snapshot;
      this.appliedSeq = seq;
      this.collection = EventCollection.fromRaw(raw);
    } catch (err) {
      console.error(`[status] refresh (${reason}) failed: ${describeError(err)}`);
      if (seq < this.appliedSeq) return this.snapshot;
    }
    this.snapshot = this.render(reason);
    return this.snapshot;
  }

  async dismiss(occurrenceKey: string): Promise<StatusSnapshot> {
    const result = this.dismissed.dismiss(occurrenceKey);
    if (!result.ok) {
      console.warn(`[status] could not dismiss ${occurrenceKey}: ${result.error.message}`);
    } else if (result.data) {
      console.log(`[status] dismissed ${occurrenceKey}`);
    }
    return this.refresh("dismissed");
  }

  private render(reason: RefreshReason): StatusSnapshot {
    const now = this.clock();
    const dismissed = this.dismissed.snapshot();
    return {
      title: this.collection.statusBarTitle(dismissed, now, this.policy),
      rows: buildMenu(this.collection, dismissed, now),
      event_count: this.collection.size,
      dismissed_count: dismissed.size,
      reason,
      refreshed_at: now.toISOString(),
    };
  }
}
