import type { WordGuessVerdict } from "../entities/RewardRules.js";
import {
  hasHiddenLetters,
  isExpired,
  pickFirstTurn,
  sessionDurationMs,
} from "../entities/SessionRules.js";
import { ExpiredError } from "../errors/ExpiredError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type {
  ActiveSessionState,
  SessionState,
  ValidSessionState,
} from "../ports/SessionGateway.js";
import type { SessionId, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { distributeRewards, type RewardSummary } from "./DistributeRewards.js";

type TransitionContext = Pick<
  CommandContext,
  "sessionGateway" | "sessionCache" | "progressionLedger" | "bus" | "logger" | "config"
>;

export interface CompletionOptions {
  readonly timedOut: boolean;
  readonly verdict?: WordGuessVerdict;
  /** Command or trigger that caused the completion, for logs */
  readonly source: string;
}

export interface SessionCompletion {
  readonly session: ValidSessionState;
  readonly rewards: RewardSummary;
}

/**
 * Saves the session through the versioned gateway and brings the cache in
 * line: refreshed while in play, evicted once completed. A stale save evicts
 * the cached copy so the next read goes to the store.
 */
export async function commitSession(
  state: SessionState,
  { sessionGateway, sessionCache }: Pick<CommandContext, "sessionGateway" | "sessionCache">,
): Promise<ValidSessionState> {
  let committed: ValidSessionState;
  try {
    committed = await sessionGateway.saveSessionState(state);
  } catch (error) {
    if (error instanceof StateConflictError && error.reason === "stale") {
      await sessionCache.forget(state);
    }
    throw error;
  }

  if (committed.status === "completed") {
    await sessionCache.forget(committed);
  } else {
    await sessionCache.refresh(committed);
  }

  return committed;
}

export function activateSession(
  state: SessionState,
  at: TimePoint,
  { config }: Pick<CommandContext, "config">,
): void {
  state.status = "active";
  state.startedAt = at;
  state.endsAt = at + sessionDurationMs(config, state.difficulty);
  state.currentTurn = pickFirstTurn(state, config.turnAssignment);
  state.updatedAt = at;
}

/** Moves the uncommitted state to completed; the caller saves it. */
export function markCompleted(state: SessionState, at: TimePoint, timedOut: boolean): void {
  state.status = "completed";
  state.completedAt = at;
  state.timedOut = timedOut;
  state.updatedAt = at;
  delete state.currentTurn;
}

/** Logs a committed completion and pays out its rewards. */
export async function settleCompletion(
  session: ValidSessionState,
  ctx: TransitionContext,
  options: CompletionOptions,
): Promise<SessionCompletion> {
  ctx.logger?.info?.("Session completed", {
    type: options.source,
    sessionId: session.id,
    at: session.completedAt,
    timedOut: options.timedOut,
    solved: !hasHiddenLetters(session.mask),
  });

  const rewards = await distributeRewards(
    session,
    {
      timedOut: options.timedOut,
      ...(options.verdict ? { verdict: options.verdict } : {}),
    },
    ctx,
  );

  return { session, rewards };
}

export async function completeSession(
  state: SessionState,
  at: TimePoint,
  ctx: TransitionContext,
  options: CompletionOptions,
): Promise<SessionCompletion> {
  markCompleted(state, at, options.timedOut);
  const session = await commitSession(state, ctx);
  return settleCompletion(session, ctx, options);
}

/** Publishes SessionCompleted once the completing move has announced itself. */
export async function announceCompletion(
  { session, rewards }: SessionCompletion,
  at: TimePoint,
  { bus }: Pick<CommandContext, "bus">,
): Promise<void> {
  await bus.publish(`session:${session.id}`, {
    type: "SessionCompleted",
    sessionId: session.id,
    at,
    word: session.word,
    timedOut: session.timedOut,
    scores: session.participants.map(({ playerId, score }) => ({ playerId, score })),
    rewards: rewards.rewards,
    levelUps: rewards.levelUps,
  });
}

/** Completes an active session whose deadline has passed; no-op otherwise. */
export async function expireIfDue(
  state: ValidSessionState,
  at: TimePoint,
  ctx: TransitionContext,
): Promise<SessionCompletion | undefined> {
  if (!isExpired(state, at)) return undefined;
  const completion = await completeSession(state, at, ctx, {
    timedOut: true,
    source: "Expiry",
  });
  await announceCompletion(completion, at, ctx);
  return completion;
}

/**
 * Rejects sessions that cannot take a move. An expired session is completed
 * first and the move is then rejected with ExpiredError.
 */
export async function assertPlayable(
  state: ValidSessionState,
  at: TimePoint,
  ctx: TransitionContext,
): Promise<ActiveSessionState> {
  if (state.status === "completed") {
    throw new StateConflictError("terminal", "Session is already completed", state.id);
  }
  if (state.status === "waiting") {
    throw new StateConflictError("not-active", "Session is not active", state.id);
  }

  const expiry = await expireIfDue(state, at, ctx);
  if (expiry) {
    throw new ExpiredError(state.id, state.endsAt);
  }

  return state;
}

/**
 * Lazily expires a session that stands in a player's way; true when it is no
 * longer open.
 */
export async function releaseIfExpired(
  sessionId: SessionId,
  at: TimePoint,
  ctx: TransitionContext,
): Promise<boolean> {
  const other = await ctx.sessionGateway.loadSessionState(sessionId);
  return (await expireIfDue(other, at, ctx)) !== undefined;
}
