export interface OracleResponse {
  /** Score as reported by the oracle; not trusted to be an integer in range */
  readonly score: unknown;
  readonly raw: unknown;
}

/**
 * Remote judge of translation quality. May reject or hang; callers bound it
 * with their own timeout and abort `signal` when it expires.
 */
export interface ScoringOracle {
  score(correctAnswer: string, submittedAnswer: string, signal: AbortSignal): Promise<OracleResponse>;
}
