import type { WordPair } from "../typedefs.js";

export interface WordCorpus {
  /** A uniformly random prompt, or `undefined` when the corpus is empty */
  randomWord(): Promise<WordPair | undefined>;
}
