import { DuelError } from "../errors/DuelError.js";
import type { CommandContext, Command } from "./Command.js";

export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  const started = Date.now();

  try {
    ctx.logger?.info?.(`[CMD] ${command.type}`, { command });
    const result = await command.execute(ctx);
    ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
    return result;
  } catch (error) {
    if (error instanceof DuelError) {
      ctx.logger?.warn?.(`[CMD REJECTED] ${command.type}`, {
        category: error.category,
        reason: error.message,
      });
    } else {
      ctx.logger?.error?.(`[CMD ERR] ${command.type}`, { error });
    }
    throw error;
  }
}
