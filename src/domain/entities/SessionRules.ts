import type { GameConfig, LetterRevealPolicy, TurnAssignment } from "../GameConfig.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import type {
  ActiveSessionState,
  Participant,
  SessionState,
  ValidSessionState,
} from "../ports/SessionGateway.js";
import type { Difficulty, PlayerId, SessionStatus, TimePoint } from "../typedefs.js";

export const MASK_PLACEHOLDER = "_";

const WORD_PATTERN = /^[A-Za-z]+$/;

export function mulberry32(seed: number) {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function isPlayableWord(word: string): boolean {
  return WORD_PATTERN.test(word);
}

export function createMask(word: string): string {
  return MASK_PLACEHOLDER.repeat(word.length);
}

export function hasHiddenLetters(mask: string): boolean {
  return mask.includes(MASK_PLACEHOLDER);
}

export function hiddenPositions(mask: string): number[] {
  const positions: number[] = [];
  for (let index = 0; index < mask.length; index += 1) {
    if (mask[index] === MASK_PLACEHOLDER) positions.push(index);
  }
  return positions;
}

export interface LetterReveal {
  readonly mask: string;
  /** Number of positions uncovered by this guess */
  readonly revealed: number;
}

/**
 * Uncovers the hidden positions holding `letter` (case-insensitive), using the
 * original-case character of the word. Positions already visible do not count.
 */
export function revealLetter(
  word: string,
  mask: string,
  letter: string,
  policy: LetterRevealPolicy = "all-occurrences",
): LetterReveal {
  const target = letter.toLowerCase();
  const lowered = word.toLowerCase();
  const next = [...mask];
  let revealed = 0;

  for (let index = 0; index < word.length; index += 1) {
    if (lowered[index] !== target || next[index] !== MASK_PLACEHOLDER) continue;
    next[index] = word.charAt(index);
    revealed += 1;
    if (policy === "first-occurrence") break;
  }

  return { mask: next.join(""), revealed };
}

export function revealPosition(word: string, mask: string, index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= word.length) {
    throw new RangeError(`Position ${index} is outside the word`);
  }
  return mask.slice(0, index) + word.charAt(index) + mask.slice(index + 1);
}

/** Hidden position chosen from the session seed; stable for a given version. */
export function pickHiddenPosition(state: SessionState): number | undefined {
  const positions = hiddenPositions(state.mask);
  if (positions.length === 0) return undefined;
  const rng = mulberry32(state.seed + state.version);
  return positions[Math.floor(rng() * positions.length)];
}

export function sessionDurationMs(config: GameConfig, difficulty: Difficulty): number {
  return config.durationsMs[difficulty];
}

export function isExpired(state: SessionState, at: TimePoint): boolean {
  if (state.status !== "active" || state.endsAt === undefined) return false;
  return at > state.endsAt;
}

export function findParticipant(
  state: SessionState,
  playerId: PlayerId,
): Participant | undefined {
  return state.participants.find((participant) => participant.playerId === playerId);
}

export function participantsInJoinOrder(state: SessionState): Participant[] {
  return [...state.participants].sort((a, b) => a.joinOrder - b.joinOrder);
}

export function pickFirstTurn(
  state: SessionState,
  assignment: TurnAssignment,
): PlayerId | undefined {
  const ordered = participantsInJoinOrder(state);
  if (assignment === "random" && ordered.length > 0) {
    const rng = mulberry32(state.seed);
    return ordered[Math.floor(rng() * ordered.length)]?.playerId;
  }
  return ordered[0]?.playerId;
}

/**
 * Round-robin successor of the current turn in join order. Falls back to the
 * first joiner when no turn is set or the holder is no longer present.
 */
export function nextTurn(state: SessionState): PlayerId | undefined {
  const ordered = participantsInJoinOrder(state);
  if (ordered.length === 0) return undefined;

  const index = ordered.findIndex(({ playerId }) => playerId === state.currentTurn);
  if (index === -1) return ordered[0]?.playerId;
  return ordered[(index + 1) % ordered.length]?.playerId;
}

// -----------------------------------------------------------------------------
//  Public projection (the secret word stays server-side until completion)
// -----------------------------------------------------------------------------

export interface SessionView {
  readonly id: string;
  readonly creator: PlayerId;
  readonly difficulty: Difficulty;
  readonly mask: string;
  readonly status: SessionStatus;
  readonly currentTurn?: PlayerId;
  readonly players: ReadonlyArray<{ readonly playerId: PlayerId; readonly score: number }>;
  readonly startedAt?: TimePoint;
  readonly endsAt?: TimePoint;
  readonly completedAt?: TimePoint;
  readonly timeRemainingMs?: number;
  readonly timedOut: boolean;
  readonly word?: string;
  readonly createdAt: TimePoint;
  readonly updatedAt: TimePoint;
}

export function toSessionView(state: SessionState, at: TimePoint): SessionView {
  return {
    id: state.id,
    creator: state.creator,
    difficulty: state.difficulty,
    mask: state.mask,
    status: state.status,
    ...(state.currentTurn !== undefined ? { currentTurn: state.currentTurn } : {}),
    players: participantsInJoinOrder(state).map(({ playerId, score }) => ({
      playerId,
      score,
    })),
    ...(state.startedAt !== undefined ? { startedAt: state.startedAt } : {}),
    ...(state.endsAt !== undefined ? { endsAt: state.endsAt } : {}),
    ...(state.completedAt !== undefined ? { completedAt: state.completedAt } : {}),
    ...(state.status === "active" && state.endsAt !== undefined
      ? { timeRemainingMs: Math.max(0, state.endsAt - at) }
      : {}),
    timedOut: state.timedOut,
    ...(state.status === "completed" ? { word: state.word } : {}),
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
  };
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check + static type narrowing
// -----------------------------------------------------------------------------
export function assertValidSessionState(
  state: SessionState,
): asserts state is ValidSessionState {
  const fail = (reason: string): never => {
    throw new InvalidSessionStateError(reason, state);
  };

  // --- 1. Generic invariants -------------------------------------------------
  if (typeof state.word !== "string" || !isPlayableWord(state.word))
    fail("missing or invalid word");
  if (typeof state.mask !== "string" || state.mask.length !== state.word.length)
    fail("mask length does not match word length");

  for (let index = 0; index < state.mask.length; index += 1) {
    const shown = state.mask[index];
    if (shown !== MASK_PLACEHOLDER && shown !== state.word[index])
      fail(`mask disagrees with word at position ${index + 1}`);
  }

  if (!Array.isArray(state.participants)) fail("missing participants");
  const ids = state.participants.map(({ playerId }) => playerId);
  if (new Set(ids).size !== ids.length) fail("duplicate participants");
  const orders = state.participants.map(({ joinOrder }) => joinOrder);
  if (new Set(orders).size !== orders.length) fail("duplicate join order");
  for (const participant of state.participants) {
    if (!Number.isInteger(participant.score))
      fail(`invalid score for ${participant.playerId}`);
  }

  if (state.currentTurn !== undefined && !ids.includes(state.currentTurn))
    fail("current turn held by a non-participant");

  if (!Number.isInteger(state.version) || state.version < 0) fail("invalid version");
  if (typeof state.seed !== "number" || !Number.isFinite(state.seed))
    fail("missing or invalid seed");

  // --- 2. Status-specific invariants ------------------------------------------
  switch (state.status) {
    case "waiting":
      if (state.startedAt !== undefined) fail("waiting session has a start time");
      if (state.completedAt !== undefined) fail("waiting session has a completion time");
      break;

    case "active":
      if (state.startedAt === undefined || state.endsAt === undefined)
        fail("active session without start or end time");
      if (state.currentTurn === undefined) fail("active session without a turn");
      if (state.completedAt !== undefined) fail("active session has a completion time");
      if (!hasHiddenLetters(state.mask)) fail("active session with a fully revealed mask");
      break;

    case "completed":
      if (state.completedAt === undefined) fail("completed session without completion time");
      break;

    default:
      fail(`invalid status: ${String(state.status)}`);
  }
}

export function isActive(state: ValidSessionState): state is ActiveSessionState {
  return state.status === "active";
}
