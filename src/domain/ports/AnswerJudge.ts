import type { Points, ScoringSource } from "../typedefs.js";

export interface ScoreResult {
  readonly points: Points;
  readonly source: ScoringSource;
}

/**
 * Judges a submitted translation against the expected answer.
 * Implementations must not reject; upstream failures become a local verdict.
 */
export interface AnswerJudge {
  score(correctAnswer: string, submittedAnswer: string): Promise<ScoreResult>;
}
