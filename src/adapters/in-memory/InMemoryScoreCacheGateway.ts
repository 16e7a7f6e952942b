import type { CachedScore, ScoreCacheGateway } from "../../domain/ports/ScoreCacheGateway.js";

export class InMemoryScoreCacheGateway implements ScoreCacheGateway {
  #entries = new Map<string, CachedScore>();

  async load(fingerprint: string): Promise<CachedScore | undefined> {
    const entry = this.#entries.get(fingerprint);
    return entry && { ...entry };
  }

  async store(entry: CachedScore): Promise<void> {
    this.#entries.set(entry.fingerprint, { ...entry });
  }

  async purgeExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [fingerprint, entry] of this.#entries) {
      if (entry.expiresAt <= now) {
        this.#entries.delete(fingerprint);
        removed += 1;
      }
    }
    return removed;
  }
}
