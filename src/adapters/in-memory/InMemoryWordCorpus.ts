import { randomIndex, secureRandom } from "../../domain/entities/Random.js";
import type { WordCorpus } from "../../domain/ports/WordCorpus.js";
import type { RandomSource, WordPair } from "../../domain/typedefs.js";

export class InMemoryWordCorpus implements WordCorpus {
  readonly #words: readonly WordPair[];
  readonly #rng: RandomSource;

  constructor(words: readonly WordPair[], rng: RandomSource = secureRandom) {
    this.#words = words.map((word) => ({ ...word }));
    this.#rng = rng;
  }

  get size(): number {
    return this.#words.length;
  }

  async randomWord(): Promise<WordPair | undefined> {
    if (this.#words.length === 0) return undefined;
    const word = this.#words[randomIndex(this.#words.length, this.#rng)];
    return word && { ...word };
  }
}
