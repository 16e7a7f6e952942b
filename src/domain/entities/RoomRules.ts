import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import type {
  FinishedRoom,
  PlayingRoom,
  RoomMember,
  RoomState,
} from "../ports/DuelGateway.js";
import type {
  MatchId,
  PlayerId,
  Points,
  RoomStatus,
  TimePoint,
  WordPair,
} from "../typedefs.js";

export const MAX_ROOM_MEMBERS = 2;

/** Seconds since the current turn started; 0 when no turn is running. */
export function elapsedSeconds(room: RoomState, now: TimePoint): number {
  if (room.turnStartedAt === null) return 0;
  return Math.max(0, (now - room.turnStartedAt) / 1000);
}

export function isTurnExpired(
  room: RoomState,
  now: TimePoint,
  turnTimeoutSeconds: number,
): room is PlayingRoom {
  return room.status === "playing" && elapsedSeconds(room, now) > turnTimeoutSeconds;
}

export function timeRemainingSeconds(
  room: PlayingRoom,
  now: TimePoint,
  turnTimeoutSeconds: number,
): number {
  return Math.max(0, Math.trunc(turnTimeoutSeconds - elapsedSeconds(room, now)));
}

/** Identifier of the running turn as shown to clients */
export function turnId(room: PlayingRoom): string {
  return `${room.matchId}:${room.turnNumber}`;
}

/** The current prompt's source text, visible only to the player whose turn it is. */
export function visiblePrompt(room: RoomState, viewer: PlayerId): string | null {
  if (room.status !== "playing" || room.currentTurn !== viewer) return null;
  return room.currentWord.source;
}

export function opponentOf(
  members: readonly RoomMember[],
  playerId: PlayerId,
): PlayerId | undefined {
  return members.find((member) => member.playerId !== playerId)?.playerId;
}

export function feedbackFor(points: Points): "correct" | "partial" | "wrong" {
  if (points === 2) return "correct";
  if (points === 1) return "partial";
  return "wrong";
}

export function startPlaying(
  room: RoomState,
  matchId: MatchId,
  firstPlayer: PlayerId,
  word: WordPair,
  at: TimePoint,
): PlayingRoom {
  return {
    code: room.code,
    mode: room.mode,
    targetScore: room.targetScore,
    createdAt: room.createdAt,
    status: "playing",
    matchId,
    turnNumber: 1,
    currentTurn: firstPlayer,
    turnStartedAt: at,
    currentWord: word,
  };
}

export function nextTurn(
  room: PlayingRoom,
  nextPlayer: PlayerId,
  word: WordPair,
  at: TimePoint,
): PlayingRoom {
  return {
    ...room,
    turnNumber: room.turnNumber + 1,
    currentTurn: nextPlayer,
    turnStartedAt: at,
    currentWord: word,
  };
}

export function finishRoom(room: PlayingRoom): FinishedRoom {
  return {
    code: room.code,
    mode: room.mode,
    targetScore: room.targetScore,
    createdAt: room.createdAt,
    turnNumber: room.turnNumber,
    matchId: room.matchId,
    status: "finished",
    currentTurn: null,
    turnStartedAt: null,
    currentWord: null,
  };
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check for rows coming from storage
// -----------------------------------------------------------------------------
export function assertValidRoomState(state: RoomState): void {
  const fail = (reason: string): never => {
    throw new InvalidRoomStateError(reason, state);
  };

  if (typeof state.code !== "string" || state.code.length === 0) fail("missing room code");
  if (state.code !== state.code.toUpperCase()) fail("room code must be upper-case");
  if (!Number.isInteger(state.targetScore) || state.targetScore < 1)
    fail("invalid target score");
  if (!Number.isInteger(state.turnNumber) || state.turnNumber < 0)
    fail("invalid turn number");

  const validStatuses: readonly RoomStatus[] = ["waiting", "playing", "finished"];
  if (!validStatuses.includes(state.status)) fail("invalid status");

  switch (state.status) {
    case "playing": {
      if (!state.matchId) fail("playing room without match");
      if (!state.currentTurn) fail("playing room without current turn");
      if (!state.turnStartedAt || state.turnStartedAt <= 0)
        fail("missing or invalid turn start time");
      if (!state.currentWord) fail("playing room without a prompt");
      if (state.turnNumber < 1) fail("playing room must have started a turn");
      break;
    }

    case "waiting":
    case "finished": {
      if (state.currentTurn !== null) fail("current turn set outside play");
      if (state.turnStartedAt !== null) fail("turn start time set outside play");
      if (state.currentWord !== null) fail("prompt set outside play");
      if (state.status === "waiting" && state.matchId !== null)
        fail("waiting room with a match");
      if (state.status === "finished" && !state.matchId) fail("finished room without match");
      break;
    }

    default:
      fail("invalid status");
  }
}
