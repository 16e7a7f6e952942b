import { DuelError } from "./DuelError.js";

export class ConflictError extends DuelError {
  readonly category = "conflict" as const;

  constructor(message: string, violation?: string) {
    super(message, violation);
    this.name = "ConflictError";
  }
}
