export type {
  AbuseLimits,
  Command,
  CommandContext,
} from "../../../src/domain/commands/Command.js";
export { CreateRoom, type RoomEntry } from "../../../src/domain/commands/CreateRoom.js";
export { JoinRoom } from "../../../src/domain/commands/JoinRoom.js";
export {
  ReadRoomState,
  type RoomView,
} from "../../../src/domain/commands/ReadRoomState.js";
export {
  RegisterGuest,
  type GuestRegistration,
} from "../../../src/domain/commands/RegisterGuest.js";
export { ResetLadder } from "../../../src/domain/commands/ResetLadder.js";
export {
  SubmitAnswer,
  type MoveOutcome,
  type SubmitChannel,
} from "../../../src/domain/commands/SubmitAnswer.js";
export { dispatchCommand } from "../../../src/domain/commands/dispatchCommand.js";
export {
  getLeaderboard,
  getPlayerStats,
  type LeaderboardEntry,
  type PlayerStats,
} from "../../../src/domain/queries/PlayerStandings.js";
export {
  createDuelConfig,
  type DuelConfig,
  type DuelConfigOverrides,
} from "../../../src/domain/DuelConfig.js";
export {
  DuelCommandInputError,
  DuelError,
  UnauthenticatedError,
  type ErrorCategory,
} from "../../../src/domain/errors/index.js";
export { isBanned } from "../../../src/domain/services/BanStore.js";
export { AnswerScorer } from "../../../src/domain/services/AnswerScorer.js";
export { ScoreCache } from "../../../src/domain/services/ScoreCache.js";
export { SlidingWindowLimiter } from "../../../src/domain/services/SlidingWindowLimiter.js";
export { ViolationTracker } from "../../../src/domain/services/ViolationTracker.js";
export { systemClock, type Clock } from "../../../src/domain/ports/Clock.js";
export type { DuelGateway } from "../../../src/domain/ports/DuelGateway.js";
export type { Identity, IdentityService } from "../../../src/domain/ports/IdentityService.js";
export type { Logger } from "../../../src/domain/ports/Logger.js";
export type { MessageBus } from "../../../src/domain/ports/MessageBus.js";
export type {
  OracleResponse,
  ScoringOracle,
} from "../../../src/domain/ports/ScoringOracle.js";
export type {
  PlayerId,
  RoomCode,
  TimePoint,
  WordPair,
} from "../../../src/domain/typedefs.js";
export { InMemoryDuelGateway } from "../../../src/adapters/in-memory/InMemoryDuelGateway.js";
export { InMemoryScoreCacheGateway } from "../../../src/adapters/in-memory/InMemoryScoreCacheGateway.js";
export { InMemoryWordCorpus } from "../../../src/adapters/in-memory/InMemoryWordCorpus.js";
