import type { DuelConfig } from "../DuelConfig.js";
import type { AnswerJudge } from "../ports/AnswerJudge.js";
import type { Clock } from "../ports/Clock.js";
import type { DuelGateway } from "../ports/DuelGateway.js";
import type { IdentityService } from "../ports/IdentityService.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { WordCorpus } from "../ports/WordCorpus.js";
import type { SlidingWindowLimiter } from "../services/SlidingWindowLimiter.js";
import type { ViolationTracker } from "../services/ViolationTracker.js";
import type { RandomSource, TimePoint } from "../typedefs.js";

/** Process-wide abuse counters shared by every command. */
export interface AbuseLimits {
  readonly submits: SlidingWindowLimiter;
  readonly joinFailures: ViolationTracker;
  readonly violations: ViolationTracker;
}

export interface CommandContext {
  readonly gateway: DuelGateway;
  readonly judge: AnswerJudge;
  readonly words: WordCorpus;
  readonly identity: IdentityService;
  readonly bus: MessageBus;
  readonly clock: Clock;
  readonly limits: AbuseLimits;
  readonly config: DuelConfig;
  /** Source for room codes and name suffixes; defaults to a CSPRNG */
  readonly random?: RandomSource;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
