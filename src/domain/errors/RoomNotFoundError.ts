import type { RoomCode } from "../typedefs.js";
import { DuelError } from "./DuelError.js";

export class RoomNotFoundError extends DuelError {
  readonly category = "not_found" as const;

  constructor(public readonly roomCode: RoomCode) {
    super(`Room not found: ${roomCode}`);
    this.name = "RoomNotFoundError";
  }
}
