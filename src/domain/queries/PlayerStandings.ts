import { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import type { DuelGateway, Player } from "../ports/DuelGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

export const MAX_LEADERBOARD_LIMIT = 100;

export interface LeaderboardEntry {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly rating: number;
  readonly wins: number;
  readonly losses: number;
  readonly totalGames: number;
  readonly winRate: number;
  readonly avgResponseTime: number;
}

export interface PlayerStats extends LeaderboardEntry {
  readonly totalMoves: number;
  readonly createdAt: TimePoint;
}

function roundTo4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function toEntry(player: Player): LeaderboardEntry {
  return {
    playerId: player.id,
    displayName: player.displayName,
    rating: player.rating,
    wins: player.wins,
    losses: player.losses,
    totalGames: player.totalGames,
    winRate: player.totalGames > 0 ? roundTo4(player.wins / player.totalGames) : 0,
    avgResponseTime:
      player.totalMoves > 0 ? roundTo4(player.totalResponseTime / player.totalMoves) : 0,
  };
}

/** Clamp a requested page size into `[1, 100]`; non-numbers fall back to the default. */
export function clampLeaderboardLimit(limit: number, fallback = 20): number {
  if (!Number.isFinite(limit)) return fallback;
  return Math.max(1, Math.min(MAX_LEADERBOARD_LIMIT, Math.trunc(limit)));
}

/** Players ordered by rating, then wins, then registration time. */
export async function getLeaderboard(
  gateway: DuelGateway,
  limit: number,
): Promise<LeaderboardEntry[]> {
  const players = await gateway.transaction((tx) =>
    tx.listTopPlayers(clampLeaderboardLimit(limit)),
  );
  return players.map(toEntry);
}

export async function getPlayerStats(
  gateway: DuelGateway,
  playerId: PlayerId,
): Promise<PlayerStats> {
  const player = await gateway.transaction((tx) => tx.findPlayer(playerId));
  if (!player) throw new PlayerNotFoundError(playerId);

  return {
    ...toEntry(player),
    totalMoves: player.totalMoves,
    createdAt: player.createdAt,
  };
}
