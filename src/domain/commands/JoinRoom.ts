import { MAX_ROOM_MEMBERS, startPlaying } from "../entities/RoomRules.js";
import { isWellFormedRoomCode, normalizeRoomCode } from "../entities/RoomCode.js";
import { ConflictError } from "../errors/ConflictError.js";
import { DuelCommandInputError } from "../errors/DuelCommandInputError.js";
import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { ban, ensureNotBanned } from "../services/BanStore.js";
import type { PlayerId, RoomCode, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import type { RoomEntry } from "./CreateRoom.js";
import { publishEvents, type DuelEvent } from "./DuelEvents.js";
import { drawWord } from "./TurnTransitions.js";

const JOIN_FAILURE_WINDOW_SECONDS = 60;

export class JoinRoom extends Command<RoomEntry> {
  readonly type = "JoinRoom" as const;
  readonly roomCode: RoomCode;

  constructor(
    roomCode: string,
    public readonly playerId: PlayerId,
    public readonly ip: string,
    public readonly at: TimePoint,
  ) {
    super();
    this.roomCode = normalizeRoomCode(roomCode);
    if (!isWellFormedRoomCode(this.roomCode)) {
      throw DuelCommandInputError.because(["Room code must contain only letters and digits"]);
    }
  }

  async execute(ctx: CommandContext): Promise<RoomEntry> {
    const { gateway, bus, words, logger } = ctx;
    const events: DuelEvent[] = [];

    let entry: RoomEntry;
    try {
      entry = await gateway.transaction(async (tx) => {
        await ensureNotBanned(tx, this.playerId, this.ip, this.at);

        const room = await tx.findRoom(this.roomCode);
        if (!room) throw new RoomNotFoundError(this.roomCode);

        if (await tx.findMember(room.code, this.playerId)) {
          logger?.info?.("Join ignored; player already in room", {
            type: this.type,
            roomCode: room.code,
            playerId: this.playerId,
          });
          return { roomCode: room.code, status: room.status };
        }

        if (room.status === "finished") {
          throw new ConflictError("Room already finished");
        }

        const members = await tx.listMembers(room.code);
        if (members.length >= MAX_ROOM_MEMBERS) {
          throw new ConflictError("Room is full");
        }

        await tx.insertMember({
          roomCode: room.code,
          playerId: this.playerId,
          joinOrder: members.length + 1,
          score: 0,
          joinedAt: this.at,
        });
        events.push({
          type: "PlayerJoined",
          roomCode: room.code,
          playerId: this.playerId,
          at: this.at,
        });

        if (members.length + 1 < MAX_ROOM_MEMBERS || room.status !== "waiting") {
          return { roomCode: room.code, status: room.status };
        }

        const [creator] = members;
        if (!creator) {
          throw new InvalidRoomStateError("waiting room without its creator", room);
        }

        const match = await tx.createMatch({
          roomCode: room.code,
          playerA: creator.playerId,
          playerB: this.playerId,
          startedAt: this.at,
        });
        const playing = startPlaying(room, match.id, creator.playerId, await drawWord(words), this.at);
        await tx.saveRoom(playing);

        events.push({
          type: "MatchStarted",
          roomCode: room.code,
          matchId: match.id,
          currentTurn: creator.playerId,
          at: this.at,
        });

        return { roomCode: playing.code, status: playing.status };
      });
    } catch (error) {
      if (error instanceof RoomNotFoundError) {
        await this.#trackFailedJoin(ctx);
      }
      throw error;
    }

    logger?.info?.("Player joined room", {
      type: this.type,
      roomCode: entry.roomCode,
      playerId: this.playerId,
      status: entry.status,
    });

    await publishEvents(bus, events);
    return entry;
  }

  /** Unknown codes count toward a brute-force ban of both player and IP. */
  async #trackFailedJoin({ gateway, limits, config, logger }: CommandContext): Promise<void> {
    const failures = limits.joinFailures.record(
      `${this.playerId}:${this.ip}`,
      JOIN_FAILURE_WINDOW_SECONDS,
    );

    logger?.warn?.("Join with unknown room code", {
      playerId: this.playerId,
      ip: this.ip,
      roomCode: this.roomCode,
      failures,
    });

    if (failures < config.maxJoinFailuresPerMinute) return;

    await gateway.transaction(async (tx) => {
      const reason = "room_code_bruteforce";
      const durationSeconds = config.banSeconds;
      await ban(tx, { entityType: "player", entityId: this.playerId, reason, durationSeconds, at: this.at }, logger);
      await ban(tx, { entityType: "ip", entityId: this.ip, reason, durationSeconds, at: this.at }, logger);
    });
  }
}
