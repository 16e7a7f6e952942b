import { DuelError } from "./DuelError.js";

export class ForbiddenActionError extends DuelError {
  readonly category = "forbidden" as const;

  constructor(message: string, violation?: string) {
    super(message, violation);
    this.name = "ForbiddenActionError";
  }
}
