export { InMemoryCacheStore } from "@word-duel/core/adapters/in-memory/InMemoryCacheStore.js";
export { InMemoryProgressionLedger } from "@word-duel/core/adapters/in-memory/InMemoryProgressionLedger.js";
export { InMemorySessionGateway } from "@word-duel/core/adapters/in-memory/InMemorySessionGateway.js";
export {
  InMemoryWordSource,
  type WordList,
} from "@word-duel/core/adapters/in-memory/InMemoryWordSource.js";
export { SessionCache } from "@word-duel/core/domain/cache/SessionCache.js";
export { CancelSession } from "@word-duel/core/domain/commands/CancelSession.js";
export type {
  Command,
  CommandContext,
} from "@word-duel/core/domain/commands/Command.js";
export { CreateSession } from "@word-duel/core/domain/commands/CreateSession.js";
export { dispatchCommand } from "@word-duel/core/domain/commands/dispatchCommand.js";
export { GetActiveSession } from "@word-duel/core/domain/commands/GetActiveSession.js";
export { GetHistory } from "@word-duel/core/domain/commands/GetHistory.js";
export { GetLeaderboard } from "@word-duel/core/domain/commands/GetLeaderboard.js";
export { GetOutcomes } from "@word-duel/core/domain/commands/GetOutcomes.js";
export { GetPlayerProgress } from "@word-duel/core/domain/commands/GetPlayerProgress.js";
export { GetSession } from "@word-duel/core/domain/commands/GetSession.js";
export { GuessLetter } from "@word-duel/core/domain/commands/GuessLetter.js";
export { GuessWord } from "@word-duel/core/domain/commands/GuessWord.js";
export { JoinSession } from "@word-duel/core/domain/commands/JoinSession.js";
export { ListSessions } from "@word-duel/core/domain/commands/ListSessions.js";
export { RevealLetter } from "@word-duel/core/domain/commands/RevealLetter.js";
export {
  ExpiredError,
  InsufficientResourceError,
  InvalidSessionStateError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from "@word-duel/core/domain/errors/index.js";
export type { GameConfig } from "@word-duel/core/domain/GameConfig.js";
export { createGameConfig } from "@word-duel/core/domain/GameConfig.js";
export type { Logger } from "@word-duel/core/domain/ports/Logger.js";
export type { MessageBus } from "@word-duel/core/domain/ports/MessageBus.js";
export type { ProgressionLedger } from "@word-duel/core/domain/ports/ProgressionLedger.js";
export type { SessionGateway } from "@word-duel/core/domain/ports/SessionGateway.js";
export type { WordSource } from "@word-duel/core/domain/ports/WordSource.js";
export { isPlayableWord } from "@word-duel/core/domain/entities/SessionRules.js";
export {
  isDifficulty,
  isSessionStatus,
  type Difficulty,
  type PlayerId,
  type SessionId,
  type TimePoint,
} from "@word-duel/core/domain/typedefs.js";
