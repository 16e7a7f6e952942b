import type { PlayerId } from "../typedefs.js";
import { DuelError } from "./DuelError.js";

export class PlayerNotFoundError extends DuelError {
  readonly category = "not_found" as const;

  constructor(public readonly playerId: PlayerId) {
    super(`Player not found: ${playerId}`);
    this.name = "PlayerNotFoundError";
  }
}
