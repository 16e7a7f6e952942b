import type { Points, ScoringSource, TimePoint } from "../typedefs.js";

export interface CachedScore {
  readonly fingerprint: string;
  readonly points: Points;
  readonly source: ScoringSource;
  readonly expiresAt: TimePoint;
}

/** Persisted (second tier) store of scoring results. */
export interface ScoreCacheGateway {
  load(fingerprint: string): Promise<CachedScore | undefined>;
  /** Insert or replace the entry for `entry.fingerprint` */
  store(entry: CachedScore): Promise<void>;
  /** Delete entries expiring at or before `now`; resolves to the number removed */
  purgeExpired(now: number): Promise<number>;
}
