import { DuelError } from "../errors/DuelError.js";
import { ban } from "../services/BanStore.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

const VIOLATION_WINDOW_SECONDS = 60;

type ViolationContext = Pick<CommandContext, "gateway" | "limits" | "config" | "logger">;

/**
 * Count one suspicious action for the player. Reaching the per-minute limit
 * bans the player in a transaction of its own.
 */
export async function recordViolation(
  ctx: ViolationContext,
  playerId: PlayerId,
  reason: string,
  at: TimePoint,
): Promise<void> {
  const count = ctx.limits.violations.record(playerId, VIOLATION_WINDOW_SECONDS);

  ctx.logger?.warn?.("Suspicious behavior detected", { playerId, reason, count });

  if (count >= ctx.config.suspiciousAttemptsPerMinute) {
    await ctx.gateway.transaction((tx) =>
      ban(
        tx,
        {
          entityType: "player",
          entityId: playerId,
          reason: `too_many_violations:${reason}`,
          durationSeconds: ctx.config.banSeconds,
          at,
        },
        ctx.logger,
      ),
    );
  }
}

/**
 * Run `work`; a rejection tagged with a violation is recorded after the
 * failed transaction has rolled back, then rethrown.
 */
export async function withViolationTracking<T>(
  ctx: ViolationContext,
  playerId: PlayerId,
  at: TimePoint,
  work: () => Promise<T>,
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof DuelError && error.violation !== undefined) {
      await recordViolation(ctx, playerId, error.violation, at);
    }
    throw error;
  }
}
