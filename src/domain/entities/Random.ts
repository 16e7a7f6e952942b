import type { RandomSource } from "../typedefs.js";

export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const secureRandom: RandomSource = () => {
  const buffer = new Uint32Array(1);
  globalThis.crypto.getRandomValues(buffer);
  return (buffer[0] ?? 0) / 4294967296;
};

/** Uniform integer in `[0, bound)` */
export function randomIndex(bound: number, rng: RandomSource): number {
  return Math.min(bound - 1, Math.floor(rng() * bound));
}
