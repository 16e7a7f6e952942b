/* eslint-disable functional/prefer-readonly-type */
import type {
  BanEntityType,
  GameMode,
  MatchId,
  PlayerId,
  Points,
  RoomCode,
  ScoringSource,
  TimePoint,
  WordPair,
} from "../typedefs.js";

export interface Player {
  readonly id: PlayerId;
  readonly displayName: string;
  rating: number;
  wins: number;
  losses: number;
  totalGames: number;
  /** Sum of response times over every recorded move, in seconds */
  totalResponseTime: number;
  totalMoves: number;
  readonly createdAt: TimePoint;
}

interface RoomFields {
  readonly code: RoomCode;
  readonly mode: GameMode;
  readonly targetScore: number;
  /** Monotonically increasing; 0 until the match starts */
  readonly turnNumber: number;
  readonly createdAt: TimePoint;
}

export interface WaitingRoom extends RoomFields {
  readonly status: "waiting";
  readonly matchId: null;
  readonly currentTurn: null;
  readonly turnStartedAt: null;
  readonly currentWord: null;
}

export interface PlayingRoom extends RoomFields {
  readonly status: "playing";
  readonly matchId: MatchId;
  /** The player whose turn it is */
  readonly currentTurn: PlayerId;
  readonly turnStartedAt: TimePoint;
  /** Prompt of the current turn; its source text is shown only to {@link currentTurn} */
  readonly currentWord: WordPair;
}

export interface FinishedRoom extends RoomFields {
  readonly status: "finished";
  readonly matchId: MatchId;
  readonly currentTurn: null;
  readonly turnStartedAt: null;
  readonly currentWord: null;
}

/**
 * The authoritative snapshot of a room. Turn fields are populated exactly
 * while the room is playing.
 */
export type RoomState = WaitingRoom | PlayingRoom | FinishedRoom;

export interface RoomMember {
  readonly roomCode: RoomCode;
  readonly playerId: PlayerId;
  /** 1 for the creator, 2 for the opponent */
  readonly joinOrder: number;
  score: number;
  readonly joinedAt: TimePoint;
}

/** A member row joined with the player fields needed for display. */
export interface RoomMemberView extends RoomMember {
  readonly displayName: string;
  readonly rating: number;
}

export interface Match {
  readonly id: MatchId;
  readonly roomCode: RoomCode;
  readonly playerA: PlayerId;
  readonly playerB: PlayerId;
  winnerId: PlayerId | null;
  readonly startedAt: TimePoint;
  finishedAt: TimePoint | null;
}

export interface Move {
  readonly id: string;
  readonly matchId: MatchId;
  readonly roomCode: RoomCode;
  readonly turnNumber: number;
  readonly playerId: PlayerId;
  readonly prompt: WordPair;
  readonly submittedText: string;
  readonly points: Points;
  readonly responseTimeSeconds: number;
  readonly source: ScoringSource;
  readonly isTimeout: boolean;
  readonly createdAt: TimePoint;
}

export type MoveDraft = Omit<Move, "id">;

export interface Ban {
  readonly entityType: BanEntityType;
  readonly entityId: string;
  readonly reason: string;
  readonly bannedUntil: TimePoint;
  readonly createdAt: TimePoint;
}

export interface NewMatch {
  readonly roomCode: RoomCode;
  readonly playerA: PlayerId;
  readonly playerB: PlayerId;
  readonly startedAt: TimePoint;
}

/**
 * Operations available inside one storage transaction. Reads return detached
 * copies; nothing is visible to other transactions until the surrounding
 * {@link DuelGateway.transaction} resolves.
 */
export interface DuelTransaction {
  /**
   * Insert a player with zeroed counters. Resolves to `undefined` when the
   * display name is already taken.
   */
  createPlayer(displayName: string, rating: number, createdAt: TimePoint): Promise<Player | undefined>;
  findPlayer(playerId: PlayerId): Promise<Player | undefined>;
  savePlayer(player: Player): Promise<void>;
  /** Players ordered by rating desc, wins desc, registration asc */
  listTopPlayers(limit: number): Promise<Player[]>;

  /** Insert a room. Resolves to `false` when the code is already in use. */
  insertRoom(room: WaitingRoom): Promise<boolean>;
  findRoom(code: RoomCode): Promise<RoomState | undefined>;
  saveRoom(room: RoomState): Promise<void>;

  insertMember(member: RoomMember): Promise<void>;
  findMember(code: RoomCode, playerId: PlayerId): Promise<RoomMember | undefined>;
  /** Members of a room in join order, with display fields */
  listMembers(code: RoomCode): Promise<RoomMemberView[]>;
  saveMember(member: RoomMember): Promise<void>;

  createMatch(match: NewMatch): Promise<Match>;
  findMatch(matchId: MatchId): Promise<Match | undefined>;
  saveMatch(match: Match): Promise<void>;
  /** Finished matches won by `winnerId` against `loserId` at or after `since` */
  countRecentWins(winnerId: PlayerId, loserId: PlayerId, since: TimePoint): Promise<number>;

  /**
   * Append a move. Resolves to `undefined` when a move for the same
   * `(matchId, turnNumber)` already exists.
   */
  insertMove(move: MoveDraft): Promise<Move | undefined>;
  findMove(matchId: MatchId, turnNumber: number): Promise<Move | undefined>;
  findLatestMove(code: RoomCode): Promise<Move | undefined>;
  countMoves(matchId: MatchId): Promise<number>;

  insertBan(ban: Ban): Promise<void>;
  /** Expiry of the latest ban for the entity, if any */
  findLatestBanExpiry(entityType: BanEntityType, entityId: string): Promise<TimePoint | undefined>;

  /**
   * Reset every player's rating and counters, then delete rooms, members,
   * matches and moves. Bans survive.
   */
  resetLadder(defaultRating: number): Promise<void>;
}

/**
 * Persistence abstraction for rooms, players, matches, moves and bans.
 * Implementations must serialise concurrent transactions and roll back every
 * change made by a transaction whose work rejects.
 */
export interface DuelGateway {
  transaction<T>(work: (tx: DuelTransaction) => Promise<T>): Promise<T>;
}
