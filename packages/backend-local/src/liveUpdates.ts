import type { LiveSessionHub } from "./adapters/LiveSessionHub.js";
import {
  ReadRoomState,
  getLeaderboard,
  type Command,
  type CommandContext,
  type Logger,
  type RoomCode,
} from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
) => Promise<TResult>;

export interface LiveUpdateDeps {
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  readonly hub: LiveSessionHub;
  readonly logger?: Logger;
}

export const LIVE_LEADERBOARD_SIZE = 20;

/** Push every connected member their own view of the room. */
export async function pushRoomState(deps: LiveUpdateDeps, roomCode: RoomCode): Promise<void> {
  const ctx = deps.createContext();
  await deps.hub.broadcastRoomState(roomCode, (playerId) =>
    deps.dispatch(new ReadRoomState(roomCode, playerId, undefined, ctx.clock.now()), ctx),
  );
}

export async function pushLeaderboard(deps: LiveUpdateDeps, roomCode: RoomCode): Promise<void> {
  try {
    const entries = await getLeaderboard(deps.createContext().gateway, LIVE_LEADERBOARD_SIZE);
    deps.hub.broadcast(roomCode, { type: "leaderboard", entries });
  } catch (error) {
    deps.logger?.warn?.("Leaderboard push failed", { roomCode, error });
  }
}
