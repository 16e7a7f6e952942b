/* eslint-disable functional/immutable-data */
import type { Clock } from "../ports/Clock.js";
import { systemClock } from "../ports/Clock.js";
import type { TimePoint } from "../typedefs.js";

/**
 * Per-key sliding window of event timestamps. Process-local; nothing
 * survives a restart.
 */
export class SlidingWindowLimiter {
  readonly #events = new Map<string, TimePoint[]>();
  readonly #clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.#clock = clock;
  }

  /** Admit and record an event unless `maxEvents` already happened within the window. */
  allow(key: string, maxEvents: number, periodSeconds: number): boolean {
    const now = this.#clock.now();
    const events = evictBefore(this.#events.get(key), now - periodSeconds * 1000);

    if (events.length >= maxEvents) {
      this.#events.set(key, events);
      return false;
    }

    events.push(now);
    this.#events.set(key, events);
    return true;
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

export function evictBefore(events: TimePoint[] | undefined, windowStart: TimePoint): TimePoint[] {
  if (!events) return [];
  let firstKept = 0;
  while (firstKept < events.length && (events[firstKept] ?? windowStart) < windowStart) {
    firstKept += 1;
  }
  if (firstKept > 0) {
    events.splice(0, firstKept);
  }
  return events;
}
