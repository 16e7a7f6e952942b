import { DuelError } from "./DuelError.js";

export class RateLimitedError extends DuelError {
  readonly category = "rate_limited" as const;

  constructor(message: string) {
    super(message);
    this.name = "RateLimitedError";
  }
}
