/* eslint-disable functional/immutable-data */
import { elapsedSeconds, feedbackFor } from "../entities/RoomRules.js";
import { normalizeRoomCode } from "../entities/RoomCode.js";
import { ConflictError } from "../errors/ConflictError.js";
import { DuelCommandInputError } from "../errors/DuelCommandInputError.js";
import { ForbiddenActionError } from "../errors/ForbiddenActionError.js";
import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import { RateLimitedError } from "../errors/RateLimitedError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { DuelTransaction } from "../ports/DuelGateway.js";
import { ban, ensureNotBanned } from "../services/BanStore.js";
import type {
  MatchId,
  PlayerId,
  Points,
  RoomCode,
  ScoringSource,
  TimePoint,
  WordPair,
} from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishEvents, type DuelEvent } from "./DuelEvents.js";
import { advanceTurn, applyTurnTimeout, finishMatch } from "./TurnTransitions.js";
import { withViolationTracking } from "./violations.js";

export const MAX_ANSWER_LENGTH = 256;
const SUBMIT_WINDOW_SECONDS = 60;

export type SubmitChannel = "http" | "ws";

export interface MoveOutcome {
  readonly roomCode: RoomCode;
  readonly turnNumber: number;
  readonly points: Points;
  readonly source: ScoringSource;
  readonly feedback: "correct" | "partial" | "wrong";
  readonly correctAnswer: string;
  readonly gameOver: boolean;
  readonly winnerId: PlayerId | null;
}

/** What phase 1 saw; phase 2 commits only if the room still matches it. */
interface TurnSnapshot {
  readonly matchId: MatchId;
  readonly turnNumber: number;
  readonly prompt: WordPair;
  readonly elapsedSeconds: number;
}

export class SubmitAnswer extends Command<MoveOutcome> {
  readonly type = "SubmitAnswer" as const;
  readonly roomCode: RoomCode;
  readonly answer: string;

  constructor(
    roomCode: string,
    public readonly playerId: PlayerId,
    public readonly ip: string,
    answer: string,
    public readonly channel: SubmitChannel,
    public readonly at: TimePoint,
  ) {
    super();

    this.roomCode = normalizeRoomCode(roomCode);
    this.answer = answer.trim();

    if (this.answer.length === 0 || this.answer.length > MAX_ANSWER_LENGTH) {
      throw DuelCommandInputError.because([
        `Answer must be between 1 and ${MAX_ANSWER_LENGTH} characters`,
      ]);
    }
  }

  async execute(ctx: CommandContext): Promise<MoveOutcome> {
    const { gateway, judge, limits, config, logger } = ctx;

    const submitKey = `submit:${this.playerId}:${this.roomCode}`;
    if (!limits.submits.allow(submitKey, config.submitsPerMinute, SUBMIT_WINDOW_SECONDS)) {
      await gateway.transaction((tx) =>
        ban(
          tx,
          {
            entityType: "player",
            entityId: this.playerId,
            reason: "submit_rate_limit",
            durationSeconds: config.banSeconds,
            at: this.at,
          },
          logger,
        ),
      );
      throw new RateLimitedError("Too many submit attempts");
    }

    const snapshot = await withViolationTracking(ctx, this.playerId, this.at, () =>
      this.#captureTurn(ctx),
    );

    const verdict = await judge.score(snapshot.prompt.target, this.answer);

    const events: DuelEvent[] = [];
    const settledAt = ctx.clock.now();
    const outcome = await gateway.transaction((tx) =>
      this.#settle(tx, snapshot, verdict.points, verdict.source, settledAt, ctx, events),
    );

    logger?.info?.("Move settled", {
      type: this.type,
      channel: this.channel,
      roomCode: this.roomCode,
      playerId: this.playerId,
      turnNumber: outcome.turnNumber,
      points: outcome.points,
      source: outcome.source,
      gameOver: outcome.gameOver,
    });

    await publishEvents(ctx.bus, events);
    return outcome;
  }

  /**
   * Phase 1: reconcile any expired turn and commit that, then validate the
   * submission against a fresh read and capture the turn it targets.
   */
  async #captureTurn(ctx: CommandContext): Promise<TurnSnapshot> {
    const events: DuelEvent[] = [];

    const expired = await ctx.gateway.transaction(async (tx) => {
      await ensureNotBanned(tx, this.playerId, this.ip, this.at);

      const room = await tx.findRoom(this.roomCode);
      if (!room) throw new RoomNotFoundError(this.roomCode);

      if (!(await tx.findMember(room.code, this.playerId))) {
        throw new ForbiddenActionError("You are not in this room", "submit_without_membership");
      }

      if (room.status !== "playing") return undefined;
      return applyTurnTimeout(tx, room, this.at, ctx, events);
    });

    await publishEvents(ctx.bus, events);

    return ctx.gateway.transaction(async (tx) => {
      const room = await tx.findRoom(this.roomCode);
      if (!room) throw new RoomNotFoundError(this.roomCode);

      if (room.status !== "playing") {
        throw new ConflictError("Match is not active");
      }

      if (room.currentTurn !== this.playerId) {
        if (expired?.playerId === this.playerId) {
          throw new ConflictError("Turn expired");
        }
        throw new ForbiddenActionError("Not your turn", "submit_not_your_turn");
      }

      const elapsed = elapsedSeconds(room, this.at);
      if (elapsed > ctx.config.turnTimeoutSeconds) {
        throw new ConflictError("Turn expired");
      }

      if (await tx.findMove(room.matchId, room.turnNumber)) {
        throw new ConflictError("Turn already submitted", "double_submit");
      }

      return {
        matchId: room.matchId,
        turnNumber: room.turnNumber,
        prompt: room.currentWord,
        elapsedSeconds: elapsed,
      };
    });
  }

  /** Phase 2: re-validate the snapshot and commit the move with its consequences. */
  async #settle(
    tx: DuelTransaction,
    snapshot: TurnSnapshot,
    points: Points,
    source: ScoringSource,
    at: TimePoint,
    ctx: CommandContext,
    events: DuelEvent[],
  ): Promise<MoveOutcome> {
    await ensureNotBanned(tx, this.playerId, this.ip, at);

    const room = await tx.findRoom(this.roomCode);
    if (!room) throw new RoomNotFoundError(this.roomCode);

    if (room.status !== "playing") {
      throw new ConflictError("Match is not active");
    }

    if (
      room.matchId !== snapshot.matchId ||
      room.turnNumber !== snapshot.turnNumber ||
      room.currentTurn !== this.playerId
    ) {
      throw new ConflictError("Turn changed, retry with fresh state");
    }

    const move = await tx.insertMove({
      matchId: snapshot.matchId,
      roomCode: room.code,
      turnNumber: snapshot.turnNumber,
      playerId: this.playerId,
      prompt: snapshot.prompt,
      submittedText: this.answer,
      points,
      responseTimeSeconds: snapshot.elapsedSeconds,
      source,
      isTimeout: false,
      createdAt: at,
    });
    if (!move) {
      throw new ConflictError("Turn already submitted");
    }

    events.push({
      type: "MoveSettled",
      roomCode: room.code,
      matchId: move.matchId,
      turnNumber: move.turnNumber,
      playerId: move.playerId,
      points,
      source,
      at,
    });

    const player = await tx.findPlayer(this.playerId);
    const member = await tx.findMember(room.code, this.playerId);
    if (!player || !member) {
      throw new InvalidRoomStateError("submitting player is not a member", room);
    }

    player.totalMoves += 1;
    player.totalResponseTime += snapshot.elapsedSeconds;
    await tx.savePlayer(player);

    member.score += points;
    await tx.saveMember(member);

    const gameOver = member.score >= room.targetScore;
    if (gameOver) {
      await finishMatch(tx, room, this.playerId, at, ctx, events);
    } else {
      await advanceTurn(tx, room, at, ctx, events);
    }

    return {
      roomCode: room.code,
      turnNumber: snapshot.turnNumber,
      points,
      source,
      feedback: feedbackFor(points),
      correctAnswer: snapshot.prompt.target,
      gameOver,
      winnerId: gameOver ? this.playerId : null,
    };
  }
}
