import { DuelError } from "./DuelError.js";

export class UnauthenticatedError extends DuelError {
  readonly category = "unauthenticated" as const;

  constructor(message = "Unauthenticated") {
    super(message);
    this.name = "UnauthenticatedError";
  }
}
