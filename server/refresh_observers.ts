export type SystemNotification = "calendar_changed" | "system_wake";

export type RefreshObserverOptions = {
  intervalMs: number;
  onNotification: (notification: SystemNotification) => void;
  now?: () => number;
};

export type RefreshObserverHandle = {
  stop(): void;
};

// A tick this late means the timer was frozen, i.e. the machine slept.
const WAKE_DRIFT_FACTOR = 2;

export function classifyTick(elapsedMs: number, intervalMs: number): SystemNotification {
  return elapsedMs > intervalMs * WAKE_DRIFT_FACTOR ? "system_wake" : "calendar_changed";
}

export function startRefreshObservers(options: RefreshObserverOptions): RefreshObserverHandle {
  const now = options.now ?? (() => Date.now());
  let lastTickAt = now();

  const timer = setInterval(() => {
    const tickAt = now();
    const notification = classifyTick(tickAt - lastTickAt, options.intervalMs);
    lastTickAt = tickAt;
    if (notification === "system_wake") {
      console.log("[observers] wake detected, refreshing");
    }
    options.onNotification(notification);
  }, options.intervalMs);
  timer.unref();

  return {
    stop() {
      clearInterval(timer);
    },
  };
}
