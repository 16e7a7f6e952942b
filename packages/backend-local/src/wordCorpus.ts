import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { InMemoryWordCorpus, type WordPair } from "./core.js";

/** Next to the sources, or next to the package when running from `dist/`. */
export function resolveDefaultWordsFile(): string {
  const candidates = [
    new URL("../data/words.json", import.meta.url),
    new URL("../../../../packages/backend-local/data/words.json", import.meta.url),
  ].map((url) => fileURLToPath(url));

  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new Error(`Word list not found; looked in ${candidates.join(", ")}`);
  }
  return found;
}

function isWordPair(value: unknown): value is WordPair {
  if (typeof value !== "object" || value === null) return false;
  const source: unknown = Reflect.get(value, "source");
  const target: unknown = Reflect.get(value, "target");
  return (
    typeof source === "string" &&
    typeof target === "string" &&
    source.trim().length > 0 &&
    target.trim().length > 0
  );
}

/** Parse a JSON array of `{ source, target }` prompts, rejecting malformed entries. */
export function parseWordList(json: string): WordPair[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new Error("Word list must be a JSON array");
  }

  return parsed.map((entry: unknown, index) => {
    if (!isWordPair(entry)) {
      throw new Error(`Word list entry ${index} must have non-empty "source" and "target"`);
    }
    return { source: entry.source.trim(), target: entry.target.trim() };
  });
}

export async function loadWordCorpus(path?: string): Promise<InMemoryWordCorpus> {
  const file = path ?? resolveDefaultWordsFile();
  return new InMemoryWordCorpus(parseWordList(await readFile(file, "utf8")));
}
