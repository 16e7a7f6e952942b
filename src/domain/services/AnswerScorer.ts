import { createHash } from "node:crypto";

import type { AnswerJudge, ScoreResult } from "../ports/AnswerJudge.js";
import type { Logger } from "../ports/Logger.js";
import type { ScoringOracle } from "../ports/ScoringOracle.js";
import type { Points } from "../typedefs.js";
import type { ScoreCache } from "./ScoreCache.js";

const SYNONYMS: ReadonlyMap<string, readonly string[]> = new Map([
  ["hello", ["hi", "hey"]],
  ["car", ["automobile", "vehicle"]],
  ["house", ["home"]],
  ["friend", ["mate", "buddy"]],
  ["dog", ["puppy", "hound"]],
  ["cat", ["kitty", "kitten"]],
  ["thank you", ["thanks", "thx"]],
  ["good morning", ["morning"]],
  ["good night", ["night"]],
]);

const SEMANTIC_LITE_THRESHOLD = 0.5;

export interface AnswerScorerOptions {
  readonly cache: ScoreCache;
  /** Remote judge; omitted when remote scoring is disabled */
  readonly oracle?: ScoringOracle;
  readonly oracleTimeoutMs: number;
  readonly logger?: Logger;
}

class OracleTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Scoring oracle did not answer within ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

/**
 * Scores an answer from cache, local heuristics, the remote oracle and
 * finally token overlap, in that order. Never rejects.
 */
export class AnswerScorer implements AnswerJudge {
  readonly #options: AnswerScorerOptions;

  constructor(options: AnswerScorerOptions) {
    this.#options = options;
  }

  async score(correctAnswer: string, submittedAnswer: string): Promise<ScoreResult> {
    const correct = normalizeAnswer(correctAnswer);
    const submitted = normalizeAnswer(submittedAnswer);
    const key = fingerprint(correct, submitted);

    const cached = await this.#options.cache.get(key);
    if (cached) return cached;

    const result =
      quickMatch(correct, submitted) ??
      (await this.#askOracle(correctAnswer, submittedAnswer)) ??
      semanticLite(correct, submitted);

    await this.#options.cache.put(key, result);
    return result;
  }

  async #askOracle(correctAnswer: string, submittedAnswer: string): Promise<ScoreResult | undefined> {
    const { oracle, oracleTimeoutMs, logger } = this.#options;
    if (!oracle) return undefined;

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new OracleTimeoutError(oracleTimeoutMs));
        controller.abort();
      }, oracleTimeoutMs);
    });

    try {
      const response = await Promise.race([
        oracle.score(correctAnswer, submittedAnswer, controller.signal),
        deadline,
      ]);

      const points = toPoints(response.score);
      if (points === undefined) {
        logger?.warn?.("Scoring oracle returned an unusable score", { raw: response.raw });
        return undefined;
      }
      return { points, source: "llm" };
    } catch (error) {
      if (error instanceof OracleTimeoutError) {
        logger?.warn?.("Scoring oracle timed out", { timeoutMs: oracleTimeoutMs });
      } else {
        logger?.error?.("Scoring oracle call failed", { error });
      }
      return undefined;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function normalizeAnswer(text: string): string {
  return text.toLowerCase().trim().split(/\s+/).filter(Boolean).join(" ");
}

export function fingerprint(correct: string, submitted: string): string {
  return createHash("sha256").update(`${correct}::${submitted}`, "utf8").digest("hex");
}

/** Heuristic verdicts that need no oracle. Inputs are already normalised. */
export function quickMatch(correct: string, submitted: string): ScoreResult | undefined {
  if (submitted === correct) {
    return { points: 2, source: "fallback_exact" };
  }

  if (SYNONYMS.get(correct)?.includes(submitted) || SYNONYMS.get(submitted)?.includes(correct)) {
    return { points: 2, source: "fallback_synonym" };
  }

  if (correct.length > 0 && submitted.length > correct.length && submitted.includes(correct)) {
    return { points: 1, source: "fallback_contains" };
  }

  return undefined;
}

/** Jaccard similarity of whitespace tokens. */
export function semanticLite(correct: string, submitted: string): ScoreResult {
  const correctTokens = new Set(correct.split(" ").filter(Boolean));
  const submittedTokens = new Set(submitted.split(" ").filter(Boolean));

  if (correctTokens.size === 0 || submittedTokens.size === 0) {
    return { points: 0, source: "fallback_semantic_lite" };
  }

  let intersection = 0;
  for (const token of submittedTokens) {
    if (correctTokens.has(token)) intersection += 1;
  }
  const union = correctTokens.size + submittedTokens.size - intersection;

  return {
    points: intersection / union >= SEMANTIC_LITE_THRESHOLD ? 1 : 0,
    source: "fallback_semantic_lite",
  };
}

/** Integer part of the oracle's score, clamped to the points range. */
export function toPoints(score: unknown): Points | undefined {
  const value =
    typeof score === "number"
      ? score
      : typeof score === "string" && score.trim() !== ""
        ? Number(score)
        : Number.NaN;

  if (!Number.isFinite(value)) return undefined;

  const truncated = Math.trunc(value);
  if (truncated <= 0) return 0;
  if (truncated >= 2) return 2;
  return 1;
}
