import { ForbiddenActionError } from "../errors/ForbiddenActionError.js";
import type { Identity } from "../ports/IdentityService.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Admin-only: restore every rating and counter and delete all match history. Bans are kept. */
export class ResetLadder extends Command {
  readonly type = "ResetLadder" as const;

  constructor(
    public readonly actor: Identity,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gateway, config, logger }: CommandContext): Promise<void> {
    if (!this.actor.isAdmin) {
      throw new ForbiddenActionError("Admin access required");
    }

    await gateway.transaction((tx) => tx.resetLadder(config.defaultRating));

    logger?.warn?.("Ladder reset", {
      type: this.type,
      actor: this.actor.playerId,
      defaultRating: config.defaultRating,
      at: this.at,
    });
  }
}
