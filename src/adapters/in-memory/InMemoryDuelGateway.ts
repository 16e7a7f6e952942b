/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { assertValidRoomState } from "../../domain/entities/RoomRules.js";
import type {
  Ban,
  DuelGateway,
  DuelTransaction,
  Match,
  Move,
  MoveDraft,
  NewMatch,
  Player,
  RoomMember,
  RoomMemberView,
  RoomState,
  WaitingRoom,
} from "../../domain/ports/DuelGateway.js";
import type {
  BanEntityType,
  MatchId,
  PlayerId,
  RoomCode,
  TimePoint,
} from "../../domain/typedefs.js";

interface DuelTables {
  players: Map<PlayerId, Player>;
  rooms: Map<RoomCode, RoomState>;
  /** Keyed by `${roomCode}:${playerId}` */
  members: Map<string, RoomMember>;
  matches: Map<MatchId, Match>;
  moves: Move[];
  bans: Ban[];
  sequence: { player: number; match: number; move: number };
}

function emptyTables(): DuelTables {
  return {
    players: new Map(),
    rooms: new Map(),
    members: new Map(),
    matches: new Map(),
    moves: [],
    bans: [],
    sequence: { player: 1, match: 1, move: 1 },
  };
}

function memberKey(code: RoomCode, playerId: PlayerId): string {
  return `${code}:${playerId}`;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Transactional in-process store. Transactions run one at a time against a
 * private copy of every table; the copy replaces the live tables only when
 * the work resolves.
 */
export class InMemoryDuelGateway implements DuelGateway {
  #tables: DuelTables = emptyTables();
  #tail: Promise<void> = Promise.resolve();

  transaction<T>(work: (tx: DuelTransaction) => Promise<T>): Promise<T> {
    const run = this.#tail.then(() => this.#run(work));
    this.#tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async #run<T>(work: (tx: DuelTransaction) => Promise<T>): Promise<T> {
    const working = clone(this.#tables);
    const tx = new InMemoryDuelTransaction(working);

    try {
      const result = await work(tx);
      this.#tables = working;
      return result;
    } finally {
      tx.close();
    }
  }
}

class InMemoryDuelTransaction implements DuelTransaction {
  readonly #tables: DuelTables;
  #open = true;

  constructor(tables: DuelTables) {
    this.#tables = tables;
  }

  close(): void {
    this.#open = false;
  }

  #use(): DuelTables {
    if (!this.#open) {
      throw new Error("Transaction already completed");
    }
    return this.#tables;
  }

  async createPlayer(
    displayName: string,
    rating: number,
    createdAt: TimePoint,
  ): Promise<Player | undefined> {
    const tables = this.#use();
    for (const existing of tables.players.values()) {
      if (existing.displayName === displayName) return undefined;
    }

    const player: Player = {
      id: `player-${tables.sequence.player++}`,
      displayName,
      rating,
      wins: 0,
      losses: 0,
      totalGames: 0,
      totalResponseTime: 0,
      totalMoves: 0,
      createdAt,
    };
    tables.players.set(player.id, player);
    return clone(player);
  }

  async findPlayer(playerId: PlayerId): Promise<Player | undefined> {
    const player = this.#use().players.get(playerId);
    return player && clone(player);
  }

  async savePlayer(player: Player): Promise<void> {
    const tables = this.#use();
    if (!tables.players.has(player.id)) {
      throw new Error(`Player ${player.id} not found`);
    }
    tables.players.set(player.id, clone(player));
  }

  async listTopPlayers(limit: number): Promise<Player[]> {
    return [...this.#use().players.values()]
      .sort(
        (a, b) =>
          b.rating - a.rating || b.wins - a.wins || a.createdAt - b.createdAt,
      )
      .slice(0, limit)
      .map(clone);
  }

  async insertRoom(room: WaitingRoom): Promise<boolean> {
    const tables = this.#use();
    if (tables.rooms.has(room.code)) return false;
    assertValidRoomState(room);
    tables.rooms.set(room.code, clone(room));
    return true;
  }

  async findRoom(code: RoomCode): Promise<RoomState | undefined> {
    const room = this.#use().rooms.get(code);
    if (!room) return undefined;
    assertValidRoomState(room);
    return clone(room);
  }

  async saveRoom(room: RoomState): Promise<void> {
    const tables = this.#use();
    if (!tables.rooms.has(room.code)) {
      throw new Error(`Room ${room.code} not found`);
    }
    assertValidRoomState(room);
    tables.rooms.set(room.code, clone(room));
  }

  async insertMember(member: RoomMember): Promise<void> {
    const tables = this.#use();
    const key = memberKey(member.roomCode, member.playerId);
    if (!tables.rooms.has(member.roomCode)) {
      throw new Error(`Room ${member.roomCode} not found`);
    }
    if (tables.members.has(key)) {
      throw new Error(`Player ${member.playerId} already in room ${member.roomCode}`);
    }
    tables.members.set(key, clone(member));
  }

  async findMember(code: RoomCode, playerId: PlayerId): Promise<RoomMember | undefined> {
    const member = this.#use().members.get(memberKey(code, playerId));
    return member && clone(member);
  }

  async listMembers(code: RoomCode): Promise<RoomMemberView[]> {
    const tables = this.#use();
    const views: RoomMemberView[] = [];
    for (const member of tables.members.values()) {
      if (member.roomCode !== code) continue;
      const player = tables.players.get(member.playerId);
      views.push({
        ...clone(member),
        displayName: player?.displayName ?? "",
        rating: player?.rating ?? 0,
      });
    }
    return views.sort((a, b) => a.joinOrder - b.joinOrder);
  }

  async saveMember(member: RoomMember): Promise<void> {
    const tables = this.#use();
    const key = memberKey(member.roomCode, member.playerId);
    if (!tables.members.has(key)) {
      throw new Error(`Player ${member.playerId} not in room ${member.roomCode}`);
    }
    tables.members.set(key, clone(member));
  }

  async createMatch(match: NewMatch): Promise<Match> {
    const tables = this.#use();
    const created: Match = {
      id: `match-${tables.sequence.match++}`,
      roomCode: match.roomCode,
      playerA: match.playerA,
      playerB: match.playerB,
      winnerId: null,
      startedAt: match.startedAt,
      finishedAt: null,
    };
    tables.matches.set(created.id, created);
    return clone(created);
  }

  async findMatch(matchId: MatchId): Promise<Match | undefined> {
    const match = this.#use().matches.get(matchId);
    return match && clone(match);
  }

  async saveMatch(match: Match): Promise<void> {
    const tables = this.#use();
    if (!tables.matches.has(match.id)) {
      throw new Error(`Match ${match.id} not found`);
    }
    tables.matches.set(match.id, clone(match));
  }

  async countRecentWins(winnerId: PlayerId, loserId: PlayerId, since: TimePoint): Promise<number> {
    let count = 0;
    for (const match of this.#use().matches.values()) {
      const samePair =
        (match.playerA === winnerId && match.playerB === loserId) ||
        (match.playerA === loserId && match.playerB === winnerId);
      if (
        samePair &&
        match.winnerId === winnerId &&
        match.finishedAt !== null &&
        match.finishedAt >= since
      ) {
        count += 1;
      }
    }
    return count;
  }

  async insertMove(draft: MoveDraft): Promise<Move | undefined> {
    const tables = this.#use();
    const duplicate = tables.moves.some(
      (move) => move.matchId === draft.matchId && move.turnNumber === draft.turnNumber,
    );
    if (duplicate) return undefined;

    const move: Move = { id: `move-${tables.sequence.move++}`, ...clone(draft) };
    tables.moves.push(move);
    return clone(move);
  }

  async findMove(matchId: MatchId, turnNumber: number): Promise<Move | undefined> {
    const move = this.#use().moves.find(
      (candidate) => candidate.matchId === matchId && candidate.turnNumber === turnNumber,
    );
    return move && clone(move);
  }

  async findLatestMove(code: RoomCode): Promise<Move | undefined> {
    let latest: Move | undefined;
    for (const move of this.#use().moves) {
      if (move.roomCode === code && (!latest || move.createdAt >= latest.createdAt)) {
        latest = move;
      }
    }
    return latest && clone(latest);
  }

  async countMoves(matchId: MatchId): Promise<number> {
    return this.#use().moves.filter((move) => move.matchId === matchId).length;
  }

  async insertBan(ban: Ban): Promise<void> {
    this.#use().bans.push(clone(ban));
  }

  async findLatestBanExpiry(
    entityType: BanEntityType,
    entityId: string,
  ): Promise<TimePoint | undefined> {
    let latest: TimePoint | undefined;
    for (const ban of this.#use().bans) {
      if (ban.entityType !== entityType || ban.entityId !== entityId) continue;
      if (latest === undefined || ban.bannedUntil > latest) latest = ban.bannedUntil;
    }
    return latest;
  }

  async resetLadder(defaultRating: number): Promise<void> {
    const tables = this.#use();
    for (const player of tables.players.values()) {
      player.rating = defaultRating;
      player.wins = 0;
      player.losses = 0;
      player.totalGames = 0;
      player.totalResponseTime = 0;
      player.totalMoves = 0;
    }
    tables.rooms.clear();
    tables.members.clear();
    tables.matches.clear();
    tables.moves = [];
  }
}
