import { vi, type Mock } from "vitest";

import { InMemoryCacheStore } from "../../src/adapters/in-memory/InMemoryCacheStore.js";
import { InMemoryProgressionLedger } from "../../src/adapters/in-memory/InMemoryProgressionLedger.js";
import { InMemorySessionGateway } from "../../src/adapters/in-memory/InMemorySessionGateway.js";
import {
  InMemoryWordSource,
  type WordList,
} from "../../src/adapters/in-memory/InMemoryWordSource.js";
import { SessionCache } from "../../src/domain/cache/SessionCache.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import { CreateSession } from "../../src/domain/commands/CreateSession.js";
import { JoinSession } from "../../src/domain/commands/JoinSession.js";
import { createGameConfig, type GameConfig } from "../../src/domain/GameConfig.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type { PlayerProgression } from "../../src/domain/ports/ProgressionLedger.js";
import type { Participant, SessionState } from "../../src/domain/ports/SessionGateway.js";
import type {
  Difficulty,
  PlayerId,
  SessionId,
  TimePoint,
} from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

export const T0: TimePoint = Date.UTC(2024, 0, 1);
export const SEED = 42;

export const TEST_WORDS: WordList = {
  easy: ["kitten"],
  medium: ["lantern"],
  hard: ["labyrinth"],
};

export interface MessageBusMock extends MessageBus {
  readonly publish: Fn<MessageBus["publish"]>;
}

export interface LoggerMock extends Logger {
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
  readonly debug: Fn<NonNullable<Logger["debug"]>>;
}

export function createMessageBusMock(): MessageBusMock {
  return {
    publish: vi.fn<MessageBus["publish"]>().mockResolvedValue(undefined),
  };
}

export function createLoggerMock(): LoggerMock {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<NonNullable<Logger["debug"]>>(),
  };
}

/** Wall clock for cache TTLs; commands take their own `at`. */
export interface TestClock {
  now(): TimePoint;
  advance(ms: number): void;
}

export function createClock(start: TimePoint = T0): TestClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number): void {
      current += ms;
    },
  };
}

export interface TestContextOverrides {
  readonly config?: GameConfig;
  readonly words?: WordList;
  readonly progressions?: readonly PlayerProgression[];
  readonly seed?: number;
}

export interface TestContext extends CommandContext {
  readonly sessionGateway: InMemorySessionGateway;
  readonly progressionLedger: InMemoryProgressionLedger;
  readonly cacheStore: InMemoryCacheStore;
  readonly bus: MessageBusMock;
  readonly logger: LoggerMock;
  readonly clock: TestClock;
  readonly config: GameConfig;
}

/** Command context over the in-memory adapters with a recording bus. */
export function createTestContext(overrides: TestContextOverrides = {}): TestContext {
  const config = overrides.config ?? createGameConfig();
  const clock = createClock();
  const logger = createLoggerMock();
  const cacheStore = new InMemoryCacheStore(clock.now);
  const seed = overrides.seed ?? SEED;

  return {
    sessionGateway: new InMemorySessionGateway({ nextSeed: () => seed }),
    progressionLedger: new InMemoryProgressionLedger(overrides.progressions),
    wordSource: new InMemoryWordSource(overrides.words ?? TEST_WORDS, () => 0),
    sessionCache: new SessionCache(cacheStore, config.cache, logger),
    cacheStore,
    bus: createMessageBusMock(),
    config,
    logger,
    clock,
  };
}

export interface StartedSession {
  readonly sessionId: SessionId;
  readonly startedAt: TimePoint;
}

/** Creates a session for `creator` and lets `joiner` join it one second later. */
export async function startSession(
  ctx: CommandContext,
  {
    creator = "alice",
    joiner = "bob",
    difficulty = "easy",
    at = T0,
  }: {
    readonly creator?: PlayerId;
    readonly joiner?: PlayerId;
    readonly difficulty?: Difficulty;
    readonly at?: TimePoint;
  } = {},
): Promise<StartedSession> {
  const session = await new CreateSession(creator, difficulty, at).execute(ctx);
  const startedAt = at + 1_000;
  await new JoinSession(session.id, joiner, startedAt).execute(ctx);
  return { sessionId: session.id, startedAt };
}

export function publishedEvents(bus: MessageBusMock): object[] {
  return bus.publish.mock.calls.map(([, event]) => event);
}

export function publishedTypes(bus: MessageBusMock): string[] {
  return publishedEvents(bus).map((event) =>
    "type" in event && typeof event.type === "string" ? event.type : "",
  );
}

export function participant(
  playerId: PlayerId,
  joinOrder: number,
  score = 0,
): Participant {
  return { playerId, score, joinOrder, joinedAt: T0 + joinOrder * 1_000 };
}

/** An active two-player session on "kitten", alice to play. */
export function buildSessionState(overrides: Partial<SessionState> = {}): SessionState {
  return {
    id: "session-1",
    creator: "alice",
    difficulty: "easy",
    word: "kitten",
    mask: "______",
    status: "active",
    participants: [participant("alice", 0), participant("bob", 1)],
    currentTurn: "alice",
    guessedLetters: [],
    seed: SEED,
    startedAt: T0 + 1_000,
    endsAt: T0 + 601_000,
    timedOut: false,
    createdAt: T0,
    updatedAt: T0 + 1_000,
    version: 1,
    ...overrides,
  };
}
