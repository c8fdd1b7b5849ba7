/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { assertValidSessionState } from "../../domain/entities/SessionRules.js";
import { NotFoundError, StateConflictError } from "../../domain/errors/index.js";
import type {
  GuessRecord,
  NewSession,
  OutcomeRecord,
  SessionGateway,
  SessionState,
  ValidSessionState,
} from "../../domain/ports/SessionGateway.js";
import type { PlayerId, SessionId, SessionStatus } from "../../domain/typedefs.js";

export interface InMemorySessionGatewayOptions {
  /** Source of per-session seeds; cryptographically random by default */
  readonly nextSeed?: () => number;
}

function randomSeed(): number {
  const seedBuffer = new Uint32Array(1);
  globalThis.crypto.getRandomValues(seedBuffer);
  return seedBuffer[0] ?? 0;
}

export class InMemorySessionGateway implements SessionGateway {
  #sessions = new Map<SessionId, SessionState>();
  #guesses = new Map<SessionId, GuessRecord[]>();
  #outcomes: OutcomeRecord[] = [];
  #nextId = 1;
  readonly #nextSeed: () => number;

  constructor({ nextSeed = randomSeed }: InMemorySessionGatewayOptions = {}) {
    this.#nextSeed = nextSeed;
  }

  async createSession(input: NewSession): Promise<ValidSessionState> {
    const openId = this.#findOpen(input.creator);
    if (openId !== undefined) {
      throw new StateConflictError(
        "already-open",
        "You are already in an active or waiting session",
        openId,
      );
    }

    const state: SessionState = {
      id: `session-${this.#nextId++}`,
      creator: input.creator,
      difficulty: input.difficulty,
      word: input.word,
      mask: input.mask,
      status: "waiting",
      participants: [
        { playerId: input.creator, score: 0, joinOrder: 0, joinedAt: input.createdAt },
      ],
      guessedLetters: [],
      seed: this.#nextSeed(),
      timedOut: false,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
      version: 0,
    };

    assertValidSessionState(state);

    this.#sessions.set(state.id, this.#clone(state));
    this.#guesses.set(state.id, []);
    return this.#clone(state);
  }

  async loadSessionState(sessionId: SessionId): Promise<ValidSessionState> {
    const state = this.#sessions.get(sessionId);
    if (!state) throw new NotFoundError("Session", sessionId);
    assertValidSessionState(state);
    return this.#clone(state);
  }

  async saveSessionState(state: SessionState): Promise<ValidSessionState> {
    const stored = this.#sessions.get(state.id);
    if (!stored) throw new NotFoundError("Session", state.id);
    if (stored.version !== state.version) throw StateConflictError.stale(state.id);

    const next: SessionState = { ...this.#clone(state), version: stored.version + 1 };
    assertValidSessionState(next);

    this.#sessions.set(next.id, next);
    return this.#clone(next);
  }

  async findOpenSessionId(playerId: PlayerId): Promise<SessionId | undefined> {
    return this.#findOpen(playerId);
  }

  async findActiveSessionId(playerId: PlayerId): Promise<SessionId | undefined> {
    for (const state of this.#sessions.values()) {
      if (
        state.status === "active" &&
        state.participants.some((participant) => participant.playerId === playerId)
      ) {
        return state.id;
      }
    }
    return undefined;
  }

  async listSessionIds(status?: SessionStatus): Promise<readonly SessionId[]> {
    return [...this.#sessions.values()]
      .filter((state) => status === undefined || state.status === status)
      .map((state) => state.id);
  }

  async appendGuess(record: GuessRecord): Promise<void> {
    const log = this.#guesses.get(record.sessionId);
    if (!log) throw new NotFoundError("Session", record.sessionId);
    log.push({ ...record });
  }

  async listGuesses(sessionId: SessionId): Promise<readonly GuessRecord[]> {
    const log = this.#guesses.get(sessionId);
    if (!log) throw new NotFoundError("Session", sessionId);
    // stable: later inserts win ties on the timestamp
    return log
      .map((record, index) => ({ record, index }))
      .sort((a, b) => b.record.at - a.record.at || b.index - a.index)
      .map(({ record }) => ({ ...record }));
  }

  async appendOutcome(record: OutcomeRecord): Promise<void> {
    this.#outcomes.push({ ...record });
  }

  async listOutcomes(sessionId: SessionId): Promise<readonly OutcomeRecord[]> {
    return this.#outcomes
      .filter((record) => record.sessionId === sessionId)
      .map((record) => ({ ...record }));
  }

  #findOpen(playerId: PlayerId): SessionId | undefined {
    for (const state of this.#sessions.values()) {
      if (
        state.status !== "completed" &&
        state.participants.some((participant) => participant.playerId === playerId)
      ) {
        return state.id;
      }
    }
    return undefined;
  }

  #clone<T extends SessionState>(state: T): T {
    return JSON.parse(JSON.stringify(state)) as T;
  }
}
