import { randomIndex, secureRandom } from "../entities/Random.js";
import { ConflictError } from "../errors/ConflictError.js";
import { DuelCommandInputError } from "../errors/DuelCommandInputError.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export const DISPLAY_NAME_MIN_LENGTH = 2;
export const DISPLAY_NAME_MAX_LENGTH = 20;
const NAME_SUFFIX_ATTEMPTS = 20;

export interface GuestRegistration {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly accessToken: string;
  readonly isAdmin: boolean;
}

export class RegisterGuest extends Command<GuestRegistration> {
  readonly type = "RegisterGuest" as const;
  readonly displayName: string;

  constructor(
    displayName: string,
    public readonly at: TimePoint,
  ) {
    super();

    const trimmed = displayName.trim();
    if (trimmed.length < DISPLAY_NAME_MIN_LENGTH || trimmed.length > DISPLAY_NAME_MAX_LENGTH) {
      throw DuelCommandInputError.because([
        `Display name must be between ${DISPLAY_NAME_MIN_LENGTH} and ${DISPLAY_NAME_MAX_LENGTH} characters`,
      ]);
    }
    this.displayName = trimmed;
  }

  async execute({ gateway, identity, config, random, logger }: CommandContext): Promise<GuestRegistration> {
    const rng = random ?? secureRandom;

    const player = await gateway.transaction(async (tx) => {
      for (let attempt = 0; attempt <= NAME_SUFFIX_ATTEMPTS; attempt += 1) {
        const candidate =
          attempt === 0 ? this.displayName : `${this.displayName}${1000 + randomIndex(9000, rng)}`;
        const created = await tx.createPlayer(candidate, config.defaultRating, this.at);
        if (created) return created;
      }
      throw new ConflictError("Display name already taken");
    });

    const isAdmin = config.adminDisplayNames.includes(player.displayName.toLowerCase());
    const accessToken = await identity.issue({
      playerId: player.id,
      displayName: player.displayName,
      isAdmin,
    });

    logger?.info?.("Guest registered", {
      type: this.type,
      playerId: player.id,
      displayName: player.displayName,
      isAdmin,
    });

    return {
      playerId: player.id,
      displayName: player.displayName,
      accessToken,
      isAdmin,
    };
  }
}
