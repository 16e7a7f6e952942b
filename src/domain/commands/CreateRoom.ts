import { generateRoomCode } from "../entities/RoomCode.js";
import { secureRandom } from "../entities/Random.js";
import { CapacityError } from "../errors/CapacityError.js";
import { DuelCommandInputError } from "../errors/DuelCommandInputError.js";
import { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import type { WaitingRoom } from "../ports/DuelGateway.js";
import { ensureNotBanned } from "../services/BanStore.js";
import {
  GAME_MODES,
  isGameMode,
  type GameMode,
  type PlayerId,
  type RoomCode,
  type RoomStatus,
  type TimePoint,
} from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishEvents } from "./DuelEvents.js";

export const MAX_TARGET_SCORE = 100;

export interface RoomEntry {
  readonly roomCode: RoomCode;
  readonly status: RoomStatus;
}

export class CreateRoom extends Command<RoomEntry> {
  readonly type = "CreateRoom" as const;
  readonly mode: GameMode;

  constructor(
    public readonly playerId: PlayerId,
    public readonly ip: string,
    mode: string,
    public readonly targetScore: number,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isGameMode(mode)) {
      issues.push(`Mode must be one of: ${GAME_MODES.join(", ")}`);
    }
    if (!Number.isInteger(targetScore) || targetScore < 1 || targetScore > MAX_TARGET_SCORE) {
      issues.push(`Target score must be an integer between 1 and ${MAX_TARGET_SCORE}`);
    }
    if (issues.length > 0 || !isGameMode(mode)) {
      throw DuelCommandInputError.because(issues);
    }
    this.mode = mode;
  }

  async execute({ gateway, bus, config, random, logger }: CommandContext): Promise<RoomEntry> {
    const rng = random ?? secureRandom;

    const room = await gateway.transaction(async (tx) => {
      await ensureNotBanned(tx, this.playerId, this.ip, this.at);

      if (!(await tx.findPlayer(this.playerId))) {
        throw new PlayerNotFoundError(this.playerId);
      }

      for (let attempt = 0; attempt < config.roomCodeAttempts; attempt += 1) {
        const candidate: WaitingRoom = {
          code: generateRoomCode(config.roomCodeLength, rng),
          mode: this.mode,
          targetScore: this.targetScore,
          turnNumber: 0,
          createdAt: this.at,
          status: "waiting",
          matchId: null,
          currentTurn: null,
          turnStartedAt: null,
          currentWord: null,
        };

        if (await tx.insertRoom(candidate)) {
          await tx.insertMember({
            roomCode: candidate.code,
            playerId: this.playerId,
            joinOrder: 1,
            score: 0,
            joinedAt: this.at,
          });
          return candidate;
        }

        logger?.debug?.("Room code collision", { attempt, code: candidate.code });
      }

      throw new CapacityError("Could not allocate unique room code");
    });

    logger?.info?.("Room created", {
      type: this.type,
      roomCode: room.code,
      playerId: this.playerId,
      mode: room.mode,
      targetScore: room.targetScore,
    });

    await publishEvents(bus, [
      {
        type: "RoomCreated",
        roomCode: room.code,
        playerId: this.playerId,
        mode: room.mode,
        targetScore: room.targetScore,
        at: this.at,
      },
    ]);

    return { roomCode: room.code, status: room.status };
  }
}
