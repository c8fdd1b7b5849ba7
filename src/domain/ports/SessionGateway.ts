/* eslint-disable functional/prefer-readonly-type */
import type {
  Difficulty,
  Outcome,
  PlayerId,
  SessionId,
  SessionStatus,
  TimePoint,
} from "../typedefs.js";

/** A player bound to a session with a running score. */
export interface Participant {
  readonly playerId: PlayerId;
  /** Signed running score, starts at 0 */
  score: number;
  /** Position in the join sequence; drives turn rotation */
  readonly joinOrder: number;
  readonly joinedAt: TimePoint;
}

/**
 * The authoritative snapshot of one session, together with the participant
 * rows it owns. Fields may be partially populated depending on the status.
 */
export interface SessionState {
  /** Unique session identifier */
  readonly id: SessionId;

  /** Player who opened the lobby */
  readonly creator: PlayerId;

  readonly difficulty: Difficulty;

  /** Secret word; immutable once created and never sent to clients */
  readonly word: string;

  /** Partially revealed rendering of {@link word}, same length */
  mask: string;

  status: SessionStatus;

  /** Participants ordered by join order */
  participants: Participant[];

  /** Player allowed to guess the next letter. Present while active. */
  currentTurn?: PlayerId;

  /** Lower-cased letters already submitted as letter guesses */
  guessedLetters: string[];

  /** Numeric seed used to derive deterministic randomness for this session. */
  readonly seed: number;

  /** Set on activation */
  startedAt?: TimePoint;

  /** Deadline set on activation: startedAt + difficulty budget */
  endsAt?: TimePoint;

  /** When the session became completed */
  completedAt?: TimePoint;

  /** Whether completion was caused by the deadline passing */
  timedOut: boolean;

  readonly createdAt: TimePoint;
  updatedAt: TimePoint;

  /**
   * Monotonically increasing version used for compare-and-swap saves.
   * Bumped by the gateway on every successful save.
   */
  readonly version: number;
}

// -----------------------------------------------------------------------------
//  ValidSessionState: status-dependent refinement of SessionState
// -----------------------------------------------------------------------------

export type ValidSessionState =
  | (SessionState & {
      readonly status: "waiting";
    })
  | (SessionState & {
      readonly status: "active";
      readonly currentTurn: PlayerId;
      readonly startedAt: TimePoint;
      readonly endsAt: TimePoint;
    })
  | (SessionState & {
      readonly status: "completed";
      readonly completedAt: TimePoint;
    });

export type ActiveSessionState = Extract<ValidSessionState, { readonly status: "active" }>;

/** Append-only log entry of a single letter guess. */
export interface GuessRecord {
  readonly sessionId: SessionId;
  readonly playerId: PlayerId;
  readonly letter: string;
  readonly correct: boolean;
  readonly points: number;
  readonly at: TimePoint;
}

/** Append-only per-player result of a completed session. */
export interface OutcomeRecord {
  readonly sessionId: SessionId;
  readonly playerId: PlayerId;
  readonly score: number;
  readonly outcome: Outcome;
  /** Secret word, recorded even when the mask never uncovered it */
  readonly word: string;
  /** Mask at completion: the whole word when solved or disclosed */
  readonly finalMask: string;
  readonly at: TimePoint;
}

export interface NewSession {
  readonly creator: PlayerId;
  readonly difficulty: Difficulty;
  readonly word: string;
  readonly mask: string;
  readonly createdAt: TimePoint;
}

/**
 * Persistence abstraction for sessions and the records they own.
 * Participant rows are stored with their session and unique per
 * (session, player); guess records are cascade-deleted with the session while
 * outcome records outlive it.
 */
export interface SessionGateway {
  /**
   * Persist a new waiting session with its creator as the first participant.
   * The adapter generates the id and the seed, and rejects with an
   * `already-open` StateConflictError when the creator already takes part in
   * a waiting or active session, checked atomically with the insert.
   */
  createSession(input: NewSession): Promise<ValidSessionState>;

  /** Load the full session state; rejects with NotFoundError when unknown. */
  loadSessionState(sessionId: SessionId): Promise<ValidSessionState>;

  /**
   * Persist a complete session snapshot (session and participant rows)
   * atomically. The save succeeds only when the stored version equals
   * `state.version`; otherwise it rejects with a `stale` StateConflictError.
   * Returns the committed snapshot carrying the bumped version.
   */
  saveSessionState(state: SessionState): Promise<ValidSessionState>;

  /** Waiting or active session in which the player participates, if any. */
  findOpenSessionId(playerId: PlayerId): Promise<SessionId | undefined>;

  /** Active session in which the player participates, if any. */
  findActiveSessionId(playerId: PlayerId): Promise<SessionId | undefined>;

  /** Session ids with the given status (index used by expiry sweeps). */
  listSessionIds(status?: SessionStatus): Promise<readonly SessionId[]>;

  appendGuess(record: GuessRecord): Promise<void>;

  /** Guesses of a session, most recent first. */
  listGuesses(sessionId: SessionId): Promise<readonly GuessRecord[]>;

  appendOutcome(record: OutcomeRecord): Promise<void>;

  listOutcomes(sessionId: SessionId): Promise<readonly OutcomeRecord[]>;
}
