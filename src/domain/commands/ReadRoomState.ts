import {
  feedbackFor,
  timeRemainingSeconds,
  turnId,
  visiblePrompt,
} from "../entities/RoomRules.js";
import { normalizeRoomCode } from "../entities/RoomCode.js";
import { ForbiddenActionError } from "../errors/ForbiddenActionError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { Move, RoomMemberView, RoomState } from "../ports/DuelGateway.js";
import { ensureNotBanned } from "../services/BanStore.js";
import type {
  GameMode,
  MatchId,
  PlayerId,
  Points,
  RoomCode,
  RoomStatus,
  TimePoint,
} from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishEvents, type DuelEvent } from "./DuelEvents.js";
import { applyTurnTimeout } from "./TurnTransitions.js";

export interface RoomPlayerView {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly joinOrder: number;
  readonly score: number;
  readonly rating: number;
  readonly isCurrentTurn: boolean;
}

export interface CurrentTurnView {
  readonly turnId: string;
  readonly playerId: PlayerId;
  /** Source-language prompt; null for everyone except the player whose turn it is */
  readonly prompt: string | null;
  readonly timeRemaining: number;
}

export interface LastMoveView {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly turnNumber: number;
  readonly prompt: string;
  readonly correctAnswer: string;
  readonly answer: string;
  readonly points: Points;
  readonly feedback: "correct" | "partial" | "wrong";
  readonly status: "expired" | "completed";
}

export interface RoomView {
  readonly roomCode: RoomCode;
  readonly status: RoomStatus;
  readonly mode: GameMode;
  readonly targetScore: number;
  readonly turnNumber: number;
  readonly turnTimeoutSeconds: number;
  readonly matchId: MatchId | null;
  readonly players: readonly RoomPlayerView[];
  readonly currentTurn: CurrentTurnView | null;
  readonly winnerId: PlayerId | null;
  readonly lastMove: LastMoveView | null;
}

export class ReadRoomState extends Command<RoomView> {
  readonly type = "ReadRoomState" as const;
  readonly roomCode: RoomCode;

  constructor(
    roomCode: string,
    public readonly viewerId: PlayerId,
    /** Omitted for server-initiated pushes */
    public readonly ip: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
    this.roomCode = normalizeRoomCode(roomCode);
  }

  async execute(ctx: CommandContext): Promise<RoomView> {
    const events: DuelEvent[] = [];

    const view = await ctx.gateway.transaction(async (tx) => {
      await ensureNotBanned(tx, this.viewerId, this.ip, this.at);

      let room = await tx.findRoom(this.roomCode);
      if (!room) throw new RoomNotFoundError(this.roomCode);

      if (!(await tx.findMember(room.code, this.viewerId))) {
        throw new ForbiddenActionError("You are not in this room");
      }

      if (room.status === "playing") {
        const timedOut = await applyTurnTimeout(tx, room, this.at, ctx, events);
        if (timedOut) room = timedOut.room;
      }

      const members = await tx.listMembers(room.code);
      const match = room.matchId === null ? undefined : await tx.findMatch(room.matchId);
      const lastMove = await tx.findLatestMove(room.code);

      return this.#present(room, members, match?.winnerId ?? null, lastMove, ctx);
    });

    await publishEvents(ctx.bus, events);
    return view;
  }

  #present(
    room: RoomState,
    members: readonly RoomMemberView[],
    winnerId: PlayerId | null,
    lastMove: Move | undefined,
    { config }: CommandContext,
  ): RoomView {
    const currentTurn: CurrentTurnView | null =
      room.status === "playing"
        ? {
            turnId: turnId(room),
            playerId: room.currentTurn,
            prompt: visiblePrompt(room, this.viewerId),
            timeRemaining: timeRemainingSeconds(room, this.at, config.turnTimeoutSeconds),
          }
        : null;

    return {
      roomCode: room.code,
      status: room.status,
      mode: room.mode,
      targetScore: room.targetScore,
      turnNumber: room.turnNumber,
      turnTimeoutSeconds: config.turnTimeoutSeconds,
      matchId: room.matchId,
      players: members.map((member) => ({
        playerId: member.playerId,
        displayName: member.displayName,
        joinOrder: member.joinOrder,
        score: member.score,
        rating: member.rating,
        isCurrentTurn: room.currentTurn === member.playerId,
      })),
      currentTurn,
      winnerId,
      lastMove: lastMove ? presentMove(lastMove, members) : null,
    };
  }
}

function presentMove(move: Move, members: readonly RoomMemberView[]): LastMoveView {
  return {
    playerId: move.playerId,
    displayName: members.find((member) => member.playerId === move.playerId)?.displayName ?? "",
    turnNumber: move.turnNumber,
    prompt: move.prompt.source,
    correctAnswer: move.prompt.target,
    answer: move.isTimeout ? "(no answer)" : move.submittedText,
    points: move.points,
    feedback: feedbackFor(move.points),
    status: move.isTimeout ? "expired" : "completed",
  };
}
