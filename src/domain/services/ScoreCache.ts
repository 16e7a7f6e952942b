/* eslint-disable functional/immutable-data */
import type { ScoreResult } from "../ports/AnswerJudge.js";
import type { Clock } from "../ports/Clock.js";
import type { Logger } from "../ports/Logger.js";
import type { CachedScore, ScoreCacheGateway } from "../ports/ScoreCacheGateway.js";

export interface ScoreCacheOptions {
  readonly ttlSeconds: number;
  readonly clock: Clock;
  /** Persisted second tier; without it only the process-local map is used */
  readonly store?: ScoreCacheGateway;
  readonly logger?: Logger;
}

/**
 * Two-tier cache of scoring results keyed by answer fingerprint. Expiry is
 * checked on read in both tiers; a second-tier hit refills the first.
 */
export class ScoreCache {
  readonly #memory = new Map<string, CachedScore>();
  readonly #options: ScoreCacheOptions;

  constructor(options: ScoreCacheOptions) {
    this.#options = options;
  }

  async get(fingerprint: string): Promise<ScoreResult | undefined> {
    const now = this.#options.clock.now();

    const local = this.#memory.get(fingerprint);
    if (local) {
      if (local.expiresAt > now) return toResult(local);
      this.#memory.delete(fingerprint);
    }

    const stored = await this.#loadStored(fingerprint);
    if (!stored || stored.expiresAt <= now) return undefined;

    this.#memory.set(fingerprint, stored);
    return toResult(stored);
  }

  async put(fingerprint: string, result: ScoreResult): Promise<void> {
    const entry: CachedScore = {
      fingerprint,
      points: result.points,
      source: result.source,
      expiresAt: this.#options.clock.now() + this.#options.ttlSeconds * 1000,
    };

    this.#memory.set(fingerprint, entry);

    try {
      await this.#options.store?.store(entry);
    } catch (error) {
      this.#options.logger?.warn?.("Score cache write failed", { fingerprint, error });
    }
  }

  /** Number of entries held in memory */
  get size(): number {
    return this.#memory.size;
  }

  /**
   * Drop expired entries from memory and from the persisted tier. Resolves to
   * the number of persisted rows removed.
   */
  async purgeExpired(): Promise<number> {
    const now = this.#options.clock.now();
    for (const [fingerprint, entry] of this.#memory) {
      if (entry.expiresAt <= now) this.#memory.delete(fingerprint);
    }

    if (!this.#options.store) return 0;
    return this.#options.store.purgeExpired(now);
  }

  async #loadStored(fingerprint: string): Promise<CachedScore | undefined> {
    try {
      return await this.#options.store?.load(fingerprint);
    } catch (error) {
      this.#options.logger?.warn?.("Score cache read failed", { fingerprint, error });
      return undefined;
    }
  }
}

function toResult(entry: CachedScore): ScoreResult {
  return { points: entry.points, source: entry.source };
}
