import {
  findParticipant,
  hasHiddenLetters,
  pickHiddenPosition,
  revealPosition,
  toSessionView,
  type SessionView,
} from "../entities/SessionRules.js";
import { InsufficientResourceError } from "../errors/InsufficientResourceError.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { SessionState, ValidSessionState } from "../ports/SessionGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import type { RewardSummary } from "./DistributeRewards.js";
import { resolveActiveSession } from "./ActiveSession.js";
import {
  announceCompletion,
  assertPlayable,
  commitSession,
  markCompleted,
  settleCompletion,
  type SessionCompletion,
} from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

export interface RevealResult {
  /** 1-indexed position of the uncovered letter */
  readonly position: number;
  readonly mask: string;
  readonly cost: number;
  readonly remainingBalance: number;
  readonly session: SessionView;
  /** Present when the hint uncovered the last hidden letter */
  readonly rewards?: RewardSummary;
}

/** Paid hint; does not consume or rotate the turn. */
export class RevealLetter extends Command<RevealResult> {
  readonly type = "RevealLetter" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isValidPlayerId(playerId)) {
      throw ValidationError.because([PLAYER_ID_ISSUE]);
    }
  }

  async execute(ctx: CommandContext): Promise<RevealResult> {
    const { progressionLedger, bus, logger, config } = ctx;

    const resolved = await resolveActiveSession(this.playerId, ctx);
    const active = await assertPlayable(resolved, this.at, ctx);

    const state: SessionState = active;
    if (!findParticipant(state, this.playerId)) {
      throw new NotFoundError("Participant", this.playerId);
    }

    const position = pickHiddenPosition(state);
    if (position === undefined || !hasHiddenLetters(state.mask)) {
      throw new StateConflictError("nothing-to-reveal", "No hidden letters to reveal", state.id);
    }

    const cost = config.revealCost;
    const debit = await progressionLedger.deductCoins(this.playerId, cost);
    if (!debit.applied) {
      throw new InsufficientResourceError("coins", cost, debit.balance);
    }

    state.mask = revealPosition(state.word, state.mask, position);
    state.updatedAt = this.at;

    const completing = !hasHiddenLetters(state.mask);
    if (completing) {
      markCompleted(state, this.at, false);
    }

    let committed: ValidSessionState;
    try {
      committed = await commitSession(state, ctx);
    } catch (error) {
      await progressionLedger.addCoins(this.playerId, cost);
      logger?.warn?.("Reveal rolled back; coins refunded", {
        type: this.type,
        sessionId: state.id,
        playerId: this.playerId,
        cost,
        error,
      });
      throw error;
    }

    const completion: SessionCompletion | undefined = completing
      ? await settleCompletion(committed, ctx, { timedOut: false, source: this.type })
      : undefined;

    logger?.info?.("Letter revealed", {
      type: this.type,
      sessionId: committed.id,
      playerId: this.playerId,
      position: position + 1,
      cost,
      at: this.at,
    });

    await bus.publish(`session:${committed.id}`, {
      type: "LetterRevealed",
      sessionId: committed.id,
      playerId: this.playerId,
      position: position + 1,
      mask: committed.mask,
      at: this.at,
    });

    if (completion) {
      await announceCompletion(completion, this.at, ctx);
    }

    return {
      position: position + 1,
      mask: committed.mask,
      cost,
      remainingBalance: debit.balance,
      session: toSessionView(committed, this.at),
      ...(completion ? { rewards: completion.rewards } : {}),
    };
  }
}
