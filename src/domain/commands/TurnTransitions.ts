/* eslint-disable functional/immutable-data */
import { rateMatch } from "../entities/Elo.js";
import {
  finishRoom,
  isTurnExpired,
  nextTurn,
  opponentOf,
} from "../entities/RoomRules.js";
import { CapacityError } from "../errors/CapacityError.js";
import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import type {
  DuelTransaction,
  FinishedRoom,
  PlayingRoom,
} from "../ports/DuelGateway.js";
import type { WordCorpus } from "../ports/WordCorpus.js";
import { ban } from "../services/BanStore.js";
import type { PlayerId, TimePoint, WordPair } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import type { DuelEvent } from "./DuelEvents.js";

const FARM_WINDOW_MS = 60_000;

type TurnTransitionContext = Pick<CommandContext, "config" | "words" | "logger">;

export interface TimedOutTurn {
  readonly playerId: PlayerId;
  readonly turnNumber: number;
  readonly room: PlayingRoom;
}

export interface FinishedMatch {
  readonly room: FinishedRoom;
  readonly winnerId: PlayerId;
  readonly loserId: PlayerId;
}

export async function drawWord(words: WordCorpus): Promise<WordPair> {
  const word = await words.randomWord();
  if (!word) {
    throw new CapacityError("No corpus words available");
  }
  return word;
}

/** Hand the turn to the other member with a fresh prompt. */
export async function advanceTurn(
  tx: DuelTransaction,
  room: PlayingRoom,
  at: TimePoint,
  { words, logger }: TurnTransitionContext,
  events: DuelEvent[],
): Promise<PlayingRoom> {
  const members = await tx.listMembers(room.code);
  const nextPlayer = opponentOf(members, room.currentTurn);
  if (!nextPlayer) {
    throw new InvalidRoomStateError("playing room without an opponent", room);
  }

  const advanced = nextTurn(room, nextPlayer, await drawWord(words), at);
  await tx.saveRoom(advanced);

  logger?.debug?.("Turn advanced", {
    roomCode: room.code,
    turnNumber: advanced.turnNumber,
    currentTurn: nextPlayer,
  });

  events.push({
    type: "TurnAdvanced",
    roomCode: room.code,
    turnNumber: advanced.turnNumber,
    currentTurn: nextPlayer,
    at,
  });

  return advanced;
}

/**
 * Settle an expired turn with a zero-point timeout move and advance. Does
 * nothing unless the room is playing, the budget is exceeded and no move
 * exists for the turn.
 */
export async function applyTurnTimeout(
  tx: DuelTransaction,
  room: PlayingRoom,
  at: TimePoint,
  ctx: TurnTransitionContext,
  events: DuelEvent[],
): Promise<TimedOutTurn | undefined> {
  const budget = ctx.config.turnTimeoutSeconds;
  if (!isTurnExpired(room, at, budget)) return undefined;

  if (await tx.findMove(room.matchId, room.turnNumber)) return undefined;

  const inserted = await tx.insertMove({
    matchId: room.matchId,
    roomCode: room.code,
    turnNumber: room.turnNumber,
    playerId: room.currentTurn,
    prompt: room.currentWord,
    submittedText: "",
    points: 0,
    responseTimeSeconds: budget,
    source: "timeout",
    isTimeout: true,
    createdAt: at,
  });
  if (!inserted) return undefined;

  const player = await tx.findPlayer(room.currentTurn);
  if (player) {
    player.totalMoves += 1;
    player.totalResponseTime += budget;
    await tx.savePlayer(player);
  }

  ctx.logger?.info?.("Turn timed out", {
    roomCode: room.code,
    matchId: room.matchId,
    turnNumber: room.turnNumber,
    playerId: room.currentTurn,
  });

  events.push({
    type: "TurnTimedOut",
    roomCode: room.code,
    matchId: room.matchId,
    turnNumber: room.turnNumber,
    playerId: room.currentTurn,
    at,
  });

  const advanced = await advanceTurn(tx, room, at, ctx, events);

  return { playerId: room.currentTurn, turnNumber: room.turnNumber, room: advanced };
}

/**
 * Close the match with `winnerId` as winner: Elo from one pre-match
 * snapshot, win/loss counters, then the anti-farm check.
 */
export async function finishMatch(
  tx: DuelTransaction,
  room: PlayingRoom,
  winnerId: PlayerId,
  at: TimePoint,
  { config, logger }: TurnTransitionContext,
  events: DuelEvent[],
): Promise<FinishedMatch> {
  const members = await tx.listMembers(room.code);
  const loserId = opponentOf(members, winnerId);
  const match = await tx.findMatch(room.matchId);
  const winner = await tx.findPlayer(winnerId);
  const loser = loserId === undefined ? undefined : await tx.findPlayer(loserId);

  if (!loserId || !match || !winner || !loser) {
    throw new InvalidRoomStateError("match participants are incomplete", room);
  }

  const ratings = rateMatch(winner.rating, loser.rating, config.kFactor);

  winner.rating = ratings.winner;
  winner.wins += 1;
  winner.totalGames += 1;
  loser.rating = ratings.loser;
  loser.losses += 1;
  loser.totalGames += 1;
  await tx.savePlayer(winner);
  await tx.savePlayer(loser);

  match.winnerId = winnerId;
  match.finishedAt = at;
  await tx.saveMatch(match);

  const finished = finishRoom(room);
  await tx.saveRoom(finished);

  logger?.info?.("Match finished", {
    roomCode: room.code,
    matchId: room.matchId,
    winnerId,
    loserId,
    ratings,
  });

  events.push({
    type: "MatchFinished",
    roomCode: room.code,
    matchId: room.matchId,
    winnerId,
    loserId,
    winnerRating: ratings.winner,
    loserRating: ratings.loser,
    at,
  });

  const recentWins = await tx.countRecentWins(winnerId, loserId, at - FARM_WINDOW_MS);
  if (recentWins >= config.farmWinsPerMinuteThreshold) {
    await ban(
      tx,
      {
        entityType: "player",
        entityId: winnerId,
        reason: "anti_farm_triggered",
        durationSeconds: config.banSeconds,
        at,
      },
      logger,
    );
  }

  return { room: finished, winnerId, loserId };
}
