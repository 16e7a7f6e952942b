import { describe, expect, it, vi, type Mock } from "vitest";

import type { OracleResponse, ScoringOracle } from "../src/domain/ports/ScoringOracle.js";
import {
  AnswerScorer,
  fingerprint,
  normalizeAnswer,
  quickMatch,
  semanticLite,
  toPoints,
} from "../src/domain/services/AnswerScorer.js";
import { ScoreCache } from "../src/domain/services/ScoreCache.js";
import { ManualClock, createLoggerMock } from "./support/testContext.js";

type ScoreFn = ScoringOracle["score"];

function oracleReturning(score: unknown): ScoringOracle & { readonly score: Mock<ScoreFn> } {
  return {
    score: vi.fn<ScoreFn>(async (): Promise<OracleResponse> => ({ score, raw: { score } })),
  };
}

function createScorer(oracle?: ScoringOracle, oracleTimeoutMs = 1_000) {
  const logger = createLoggerMock();
  const cache = new ScoreCache({ ttlSeconds: 3_600, clock: new ManualClock() });
  const scorer = new AnswerScorer({ cache, oracle, oracleTimeoutMs, logger });
  return { scorer, logger };
}

describe("answer normalization", () => {
  it("lower-cases and collapses whitespace", () => {
    expect(normalizeAnswer("  Good \t  MORNING ")).toBe("good morning");
  });

  it("fingerprints the normalized pair", () => {
    expect(fingerprint("cat", "dog")).toMatch(/^[0-9a-f]{64}$/);
    expect(fingerprint("cat", "dog")).not.toBe(fingerprint("dog", "cat"));
  });
});

describe("local heuristics", () => {
  it("matches exact answers", () => {
    expect(quickMatch("cat", "cat")).toEqual({ points: 2, source: "fallback_exact" });
  });

  it("matches synonyms in either direction", () => {
    expect(quickMatch("car", "automobile")).toEqual({ points: 2, source: "fallback_synonym" });
    expect(quickMatch("automobile", "car")).toEqual({ points: 2, source: "fallback_synonym" });
  });

  it("gives partial credit when the answer contains the expected text", () => {
    expect(quickMatch("cat", "black cat")).toEqual({ points: 1, source: "fallback_contains" });
  });

  it("returns nothing when no heuristic applies", () => {
    expect(quickMatch("cat", "dog")).toBeUndefined();
    expect(quickMatch("constructor", "toString")).toBeUndefined();
  });

  it("scores token overlap of at least one half as partial", () => {
    expect(semanticLite("thank you very much", "thank you much")).toEqual({
      points: 1,
      source: "fallback_semantic_lite",
    });
    expect(semanticLite("good morning", "good evening")).toEqual({
      points: 0,
      source: "fallback_semantic_lite",
    });
  });

  it("clamps oracle scores into the points range", () => {
    expect(toPoints(2)).toBe(2);
    expect(toPoints(7)).toBe(2);
    expect(toPoints("1.9")).toBe(1);
    expect(toPoints(-3)).toBe(0);
    expect(toPoints("abc")).toBeUndefined();
    expect(toPoints("")).toBeUndefined();
    expect(toPoints(null)).toBeUndefined();
  });
});

describe("AnswerScorer", () => {
  it("does not consult the oracle when a heuristic decides", async () => {
    const oracle = oracleReturning(0);
    const { scorer } = createScorer(oracle);

    await expect(scorer.score("Cat", "  CAT ")).resolves.toEqual({
      points: 2,
      source: "fallback_exact",
    });
    expect(oracle.score).not.toHaveBeenCalled();
  });

  it("uses the oracle verdict with the original texts", async () => {
    const oracle = oracleReturning("1.9");
    const { scorer } = createScorer(oracle);

    await expect(scorer.score("Kitten", "small Cat")).resolves.toEqual({
      points: 1,
      source: "llm",
    });
    expect(oracle.score).toHaveBeenCalledWith("Kitten", "small Cat", expect.any(AbortSignal));
  });

  it("falls back to token overlap when the oracle score is unusable", async () => {
    const oracle = oracleReturning("maybe");
    const { scorer, logger } = createScorer(oracle);

    await expect(scorer.score("thank you very much", "thank you much")).resolves.toEqual({
      points: 1,
      source: "fallback_semantic_lite",
    });
    expect(logger.warn).toHaveBeenCalledWith("Scoring oracle returned an unusable score", {
      raw: { score: "maybe" },
    });
  });

  it("falls back when the oracle fails", async () => {
    const oracle: ScoringOracle = {
      score: vi.fn<ScoreFn>(async () => {
        throw new Error("upstream down");
      }),
    };
    const { scorer, logger } = createScorer(oracle);

    await expect(scorer.score("house", "garden")).resolves.toEqual({
      points: 0,
      source: "fallback_semantic_lite",
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Scoring oracle call failed",
      expect.objectContaining({ error: expect.any(Error) }),
    );
  });

  it("abandons and aborts an oracle call that outlives the timeout", async () => {
    const received: { signal?: AbortSignal } = {};
    const oracle: ScoringOracle = {
      score: (_correct, _submitted, signal) =>
        new Promise<OracleResponse>((_, reject) => {
          received.signal = signal;
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };
    const { scorer, logger } = createScorer(oracle, 20);

    await expect(scorer.score("house", "garden")).resolves.toEqual({
      points: 0,
      source: "fallback_semantic_lite",
    });
    expect(received.signal?.aborted).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Scoring oracle timed out", { timeoutMs: 20 });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("scores locally when no oracle is configured", async () => {
    const { scorer } = createScorer();

    await expect(scorer.score("house", "garden")).resolves.toEqual({
      points: 0,
      source: "fallback_semantic_lite",
    });
  });

  it("caches verdicts by normalized answer pair", async () => {
    const oracle = oracleReturning(2);
    const { scorer } = createScorer(oracle);

    await scorer.score("Kitten", "small cat");
    await expect(scorer.score("kitten", "  Small   CAT")).resolves.toEqual({
      points: 2,
      source: "llm",
    });
    expect(oracle.score).toHaveBeenCalledTimes(1);
  });
});
