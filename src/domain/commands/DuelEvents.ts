import type { MessageBus } from "../ports/MessageBus.js";
import type {
  GameMode,
  MatchId,
  PlayerId,
  Points,
  RoomCode,
  ScoringSource,
  TimePoint,
} from "../typedefs.js";

export type DuelEvent =
  | {
      readonly type: "RoomCreated";
      readonly roomCode: RoomCode;
      readonly playerId: PlayerId;
      readonly mode: GameMode;
      readonly targetScore: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "PlayerJoined";
      readonly roomCode: RoomCode;
      readonly playerId: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "MatchStarted";
      readonly roomCode: RoomCode;
      readonly matchId: MatchId;
      readonly currentTurn: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "TurnTimedOut";
      readonly roomCode: RoomCode;
      readonly matchId: MatchId;
      readonly turnNumber: number;
      readonly playerId: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "MoveSettled";
      readonly roomCode: RoomCode;
      readonly matchId: MatchId;
      readonly turnNumber: number;
      readonly playerId: PlayerId;
      readonly points: Points;
      readonly source: ScoringSource;
      readonly at: TimePoint;
    }
  | {
      readonly type: "TurnAdvanced";
      readonly roomCode: RoomCode;
      readonly turnNumber: number;
      readonly currentTurn: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "MatchFinished";
      readonly roomCode: RoomCode;
      readonly matchId: MatchId;
      readonly winnerId: PlayerId;
      readonly loserId: PlayerId;
      readonly winnerRating: number;
      readonly loserRating: number;
      readonly at: TimePoint;
    };

/** Publish events in order, each on its room's channel. Call only after commit. */
export async function publishEvents(bus: MessageBus, events: readonly DuelEvent[]): Promise<void> {
  for (const event of events) {
    await bus.publish(`room:${event.roomCode}`, event);
  }
}
