/* eslint-disable functional/immutable-data */
import type { Clock } from "../ports/Clock.js";
import { systemClock } from "../ports/Clock.js";
import type { TimePoint } from "../typedefs.js";
import { evictBefore } from "./SlidingWindowLimiter.js";

/** Counts suspicious actions in a rolling window. Always records. */
export class ViolationTracker {
  readonly #events = new Map<string, TimePoint[]>();
  readonly #clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.#clock = clock;
  }

  /** Record one event for `key`; returns the number of events in the window, this one included. */
  record(key: string, periodSeconds: number): number {
    const now = this.#clock.now();
    const events = evictBefore(this.#events.get(key), now - periodSeconds * 1000);
    events.push(now);
    this.#events.set(key, events);
    return events.length;
  }

  /** Number of keys currently tracked */
  get size(): number {
    return this.#events.size;
  }

  /** Drop keys whose window has emptied. */
  prune(periodSeconds: number): void {
    const windowStart = this.#clock.now() - periodSeconds * 1000;
    for (const [key, events] of this.#events) {
      if (evictBefore(events, windowStart).length === 0) {
        this.#events.delete(key);
      }
    }
  }
}
