/** Stable error categories surfaced to callers. */
export type ErrorCategory =
  | "validation"
  | "unauthenticated"
  | "not_found"
  | "forbidden"
  | "conflict"
  | "capacity"
  | "rate_limited";

export abstract class DuelError extends Error {
  abstract readonly category: ErrorCategory;

  /**
   * Set when the rejected request counts toward the caller's suspicious-activity
   * window (see `recordViolation`).
   */
  readonly violation: string | undefined;

  protected constructor(message: string, violation?: string) {
    super(message);
    this.violation = violation;
  }
}
