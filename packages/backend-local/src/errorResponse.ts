import { DuelError, type ErrorCategory } from "./core.js";

export type ErrorStatus = 401 | 403 | 404 | 409 | 422 | 429 | 500 | 503;

export interface ErrorBody {
  readonly error: ErrorCategory | "internal";
  readonly detail: string;
}

export interface ErrorResponse {
  readonly status: ErrorStatus;
  readonly body: ErrorBody;
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, ErrorStatus> = {
  validation: 422,
  unauthenticated: 401,
  not_found: 404,
  forbidden: 403,
  conflict: 409,
  capacity: 503,
  rate_limited: 429,
};

/** Anything that is not a domain error is reported as an opaque 500. */
export function describeError(error: unknown): ErrorResponse {
  if (error instanceof DuelError) {
    return {
      status: STATUS_BY_CATEGORY[error.category],
      body: { error: error.category, detail: error.message },
    };
  }
  return {
    status: 500,
    body: { error: "internal", detail: "Internal server error" },
  };
}
