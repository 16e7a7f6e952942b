import type { RoomState } from "../ports/DuelGateway.js";

export class InvalidRoomStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly state: RoomState,
  ) {
    super(`Invalid room state: ${reason}`);
    this.name = "InvalidRoomStateError";
  }
}
