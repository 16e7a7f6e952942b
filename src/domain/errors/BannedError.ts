import type { BanEntityType } from "../typedefs.js";
import { DuelError } from "./DuelError.js";

export class BannedError extends DuelError {
  readonly category = "forbidden" as const;

  constructor(public readonly entityType: BanEntityType) {
    super(entityType === "player" ? "Player is temporarily banned" : "IP is temporarily banned");
    this.name = "BannedError";
  }
}
