import { BannedError } from "../errors/BannedError.js";
import type { Logger } from "../ports/Logger.js";
import type { Ban, DuelTransaction } from "../ports/DuelGateway.js";
import type { BanEntityType, PlayerId, TimePoint } from "../typedefs.js";

export interface BanRequest {
  readonly entityType: BanEntityType;
  readonly entityId: string;
  readonly reason: string;
  readonly durationSeconds: number;
  readonly at: TimePoint;
}

/** True iff the latest ban for the entity is still running at `now`. */
export async function isBanned(
  tx: DuelTransaction,
  entityType: BanEntityType,
  entityId: string,
  now: TimePoint,
): Promise<boolean> {
  const bannedUntil = await tx.findLatestBanExpiry(entityType, entityId);
  return bannedUntil !== undefined && bannedUntil > now;
}

export async function ban(
  tx: DuelTransaction,
  request: BanRequest,
  logger?: Logger,
): Promise<Ban> {
  const entry: Ban = {
    entityType: request.entityType,
    entityId: request.entityId,
    reason: request.reason,
    bannedUntil: request.at + request.durationSeconds * 1000,
    createdAt: request.at,
  };

  await tx.insertBan(entry);

  logger?.warn?.("Entity temporarily banned", {
    type: "EntityBanned",
    entityType: entry.entityType,
    entityId: entry.entityId,
    reason: entry.reason,
    bannedUntil: entry.bannedUntil,
  });

  return entry;
}

/** Player bans are checked before IP bans. Internal callers may omit the IP. */
export async function ensureNotBanned(
  tx: DuelTransaction,
  playerId: PlayerId,
  ip: string | undefined,
  now: TimePoint,
): Promise<void> {
  if (await isBanned(tx, "player", playerId, now)) {
    throw new BannedError("player");
  }
  if (ip !== undefined && (await isBanned(tx, "ip", ip, now))) {
    throw new BannedError("ip");
  }
}
