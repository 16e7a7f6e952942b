import type { Logger, OracleResponse, ScoringOracle } from "../core.js";

interface HttpScoringOracleOptions {
  readonly url: string;
  readonly apiKey?: string;
  readonly logger?: Logger;
  readonly fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads `score`, or `result.score` when the top-level field is absent. */
export function extractScore(payload: unknown): unknown {
  if (!isRecord(payload)) return undefined;
  if (payload["score"] !== undefined && payload["score"] !== null) return payload["score"];
  const result = payload["result"];
  return isRecord(result) ? result["score"] : undefined;
}

/** Posts the answer pair as JSON to a remote translation judge. */
export class HttpScoringOracle implements ScoringOracle {
  readonly #url: string;
  readonly #apiKey: string | undefined;
  readonly #logger: Logger | undefined;
  readonly #fetch: typeof fetch;

  constructor({ url, apiKey, logger, fetch: fetchImpl }: HttpScoringOracleOptions) {
    if (!url) {
      throw new Error("ORACLE_URL is required to call the scoring oracle");
    }

    this.#url = url;
    this.#apiKey = apiKey || undefined;
    this.#logger = logger;
    this.#fetch = fetchImpl ?? globalThis.fetch;
  }

  async score(
    correctAnswer: string,
    submittedAnswer: string,
    signal: AbortSignal,
  ): Promise<OracleResponse> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.#apiKey) {
      headers["Authorization"] = `Bearer ${this.#apiKey}`;
    }

    const response = await this.#fetch(this.#url, {
      method: "POST",
      headers,
      signal,
      body: JSON.stringify({
        prompt:
          "Score translation quality from 0 to 2. 0=wrong, 1=partial, 2=correct. " +
          `Correct answer: ${correctAnswer}. User answer: ${submittedAnswer}.`,
        correct_answer: correctAnswer,
        user_answer: submittedAnswer,
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Scoring oracle failed: ${response.status} ${text}`);
    }

    const payload: unknown = await response.json();
    this.#logger?.debug?.("Scoring oracle answered", { status: response.status });

    return { score: extractScore(payload), raw: payload };
  }
}
