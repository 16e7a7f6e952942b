import { vi } from "vitest";

import { InMemoryDuelGateway } from "../../src/adapters/in-memory/InMemoryDuelGateway.js";
import { InMemoryWordCorpus } from "../../src/adapters/in-memory/InMemoryWordCorpus.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import { CreateRoom } from "../../src/domain/commands/CreateRoom.js";
import { JoinRoom } from "../../src/domain/commands/JoinRoom.js";
import {
  RegisterGuest,
  type GuestRegistration,
} from "../../src/domain/commands/RegisterGuest.js";
import { createDuelConfig, type DuelConfigOverrides } from "../../src/domain/DuelConfig.js";
import { mulberry32 } from "../../src/domain/entities/Random.js";
import { UnauthenticatedError } from "../../src/domain/errors/UnauthenticatedError.js";
import type { AnswerJudge, ScoreResult } from "../../src/domain/ports/AnswerJudge.js";
import type { Clock } from "../../src/domain/ports/Clock.js";
import type { Identity, IdentityService } from "../../src/domain/ports/IdentityService.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import { SlidingWindowLimiter } from "../../src/domain/services/SlidingWindowLimiter.js";
import { ViolationTracker } from "../../src/domain/services/ViolationTracker.js";
import type { RandomSource, RoomCode, TimePoint, WordPair } from "../../src/domain/typedefs.js";

export const START_TIME: TimePoint = Date.UTC(2024, 0, 1, 12, 0, 0);

export const TEST_WORDS: readonly WordPair[] = [
  { source: "кіт", target: "cat" },
  { source: "пес", target: "dog" },
];

export class ManualClock implements Clock {
  constructor(public current: TimePoint = START_TIME) {}

  now(): TimePoint {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface PublishedEvent {
  readonly channel: string;
  readonly event: object;
}

export class RecordingBus implements MessageBus {
  readonly published: PublishedEvent[] = [];

  async publish(channel: string, event: object): Promise<void> {
    this.published.push({ channel, event });
  }

  /** Event `type` fields in publish order */
  types(): string[] {
    return this.published.map(({ event }) => ("type" in event ? String(event.type) : ""));
  }

  clear(): void {
    this.published.length = 0;
  }
}

/**
 * Exact (case-insensitive) answers earn 2 points, anything else 0. While
 * held, verdicts wait until `release()` is called.
 */
export class FakeJudge implements AnswerJudge {
  readonly calls: Array<{ readonly correct: string; readonly submitted: string }> = [];
  #gate: Promise<void> | undefined;
  #open: (() => void) | undefined;

  hold(): void {
    this.#gate = new Promise<void>((resolve) => {
      this.#open = resolve;
    });
  }

  release(): void {
    this.#open?.();
    this.#gate = undefined;
    this.#open = undefined;
  }

  async score(correctAnswer: string, submittedAnswer: string): Promise<ScoreResult> {
    this.calls.push({ correct: correctAnswer, submitted: submittedAnswer });
    if (this.#gate) await this.#gate;

    return correctAnswer.toLowerCase() === submittedAnswer.toLowerCase()
      ? { points: 2, source: "fallback_exact" }
      : { points: 0, source: "fallback_semantic_lite" };
  }
}

/** Tokens are `token:<playerId>:<displayName>:<admin>`. */
export class FakeIdentityService implements IdentityService {
  async issue(identity: Identity): Promise<string> {
    return `token:${identity.playerId}:${identity.displayName}:${identity.isAdmin ? "1" : "0"}`;
  }

  async verify(token: string): Promise<Identity> {
    const [prefix, playerId, displayName, admin] = token.split(":");
    if (prefix !== "token" || !playerId || displayName === undefined) {
      throw new UnauthenticatedError("Invalid or expired token");
    }
    return { playerId, displayName, isAdmin: admin === "1" };
  }
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface TestContext extends CommandContext {
  readonly gateway: InMemoryDuelGateway;
  readonly judge: FakeJudge;
  readonly words: InMemoryWordCorpus;
  readonly bus: RecordingBus;
  readonly clock: ManualClock;
  readonly logger: Logger;
}

export interface TestContextOverrides {
  readonly config?: DuelConfigOverrides;
  readonly random?: RandomSource;
  readonly words?: readonly WordPair[];
}

/**
 * A command context over the in-memory gateway. The corpus always draws its
 * first word, so every turn's prompt is `кіт` / `cat` by default.
 */
export function createTestContext(overrides: TestContextOverrides = {}): TestContext {
  const clock = new ManualClock();

  return {
    gateway: new InMemoryDuelGateway(),
    judge: new FakeJudge(),
    words: new InMemoryWordCorpus(overrides.words ?? TEST_WORDS, () => 0),
    identity: new FakeIdentityService(),
    bus: new RecordingBus(),
    clock,
    limits: {
      submits: new SlidingWindowLimiter(clock),
      joinFailures: new ViolationTracker(clock),
      violations: new ViolationTracker(clock),
    },
    config: createDuelConfig(overrides.config),
    random: overrides.random ?? mulberry32(7),
    logger: createLoggerMock(),
  };
}

export function registerGuest(ctx: TestContext, displayName: string): Promise<GuestRegistration> {
  return new RegisterGuest(displayName, ctx.clock.now()).execute(ctx);
}

export interface StartedMatch {
  readonly roomCode: RoomCode;
  readonly creator: GuestRegistration;
  readonly opponent: GuestRegistration;
}

/** Register two guests (unless given), open a room and fill it. The creator moves first. */
export async function startMatch(
  ctx: TestContext,
  options: {
    readonly targetScore?: number;
    readonly creator?: GuestRegistration;
    readonly opponent?: GuestRegistration;
  } = {},
): Promise<StartedMatch> {
  const creator = options.creator ?? (await registerGuest(ctx, "alice"));
  const opponent = options.opponent ?? (await registerGuest(ctx, "bob"));

  const { roomCode } = await new CreateRoom(
    creator.playerId,
    "10.0.0.1",
    "classic",
    options.targetScore ?? 4,
    ctx.clock.now(),
  ).execute(ctx);
  await new JoinRoom(roomCode, opponent.playerId, "10.0.0.2", ctx.clock.now()).execute(ctx);

  return { roomCode, creator, opponent };
}
