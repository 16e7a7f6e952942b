import { DuelError } from "./DuelError.js";

export class CapacityError extends DuelError {
  readonly category = "capacity" as const;

  constructor(message: string) {
    super(message);
    this.name = "CapacityError";
  }
}
