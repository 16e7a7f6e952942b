/**
 * Core domain typedefs used throughout the duel.
 * Identifiers are plain string aliases; adapters decide their format.
 */

/** Unique identifier of a player */
export type PlayerId = string;

/** Short, human-enterable room code (always stored upper-case) */
export type RoomCode = string;

/** Unique identifier of a match */
export type MatchId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Room lifecycle */
export type RoomStatus = "waiting" | "playing" | "finished";

export type GameMode = "classic" | "challenge";

export const GAME_MODES: readonly GameMode[] = ["classic", "challenge"];

/** Points awarded for a single turn */
export type Points = 0 | 1 | 2;

/** Where a turn's score came from */
export type ScoringSource =
  | "llm"
  | "fallback_exact"
  | "fallback_synonym"
  | "fallback_contains"
  | "fallback_semantic_lite"
  | "timeout";

export type BanEntityType = "player" | "ip";

/** A prompt: the source-language term shown to the player and the expected answer */
export interface WordPair {
  readonly source: string;
  readonly target: string;
}

/** Source of uniformly distributed numbers in [0, 1) */
export type RandomSource = () => number;

export function isGameMode(value: unknown): value is GameMode {
  return value === "classic" || value === "challenge";
}
