import type { TimePoint } from "../typedefs.js";

export interface Clock {
  now(): TimePoint;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
