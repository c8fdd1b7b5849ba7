import { findParticipant, toSessionView, type SessionView } from "../entities/SessionRules.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import type { RewardSummary } from "./DistributeRewards.js";
import { resolveActiveSession } from "./ActiveSession.js";
import { announceCompletion, assertPlayable, completeSession } from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

export interface WordGuessResult {
  readonly success: boolean;
  readonly message: string;
  readonly points: number;
  readonly session: SessionView;
  readonly rewards: RewardSummary;
}

/**
 * A full-word guess always ends the session: a correct guess wins it for the
 * guesser, a wrong one hands it to everybody else and discloses the word.
 */
export class GuessWord extends Command<WordGuessResult> {
  readonly type = "GuessWord" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly word: string,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isValidPlayerId(playerId)) {
      throw ValidationError.because([PLAYER_ID_ISSUE]);
    }
    if (typeof word !== "string" || word.trim().length === 0) {
      throw ValidationError.because(["Word must be a non-empty string"]);
    }
  }

  async execute(ctx: CommandContext): Promise<WordGuessResult> {
    const { bus, logger, config } = ctx;

    const guess = this.word.trim();
    if (guess.length < config.minWordGuessLength || guess.length > config.maxWordGuessLength) {
      throw ValidationError.because([
        `Word must be between ${config.minWordGuessLength} and ${config.maxWordGuessLength} characters`,
      ]);
    }

    const resolved = await resolveActiveSession(this.playerId, ctx);
    const active = await assertPlayable(resolved, this.at, ctx);

    const state: SessionState = active;
    const participant = findParticipant(state, this.playerId);
    if (!participant) {
      throw new NotFoundError("Participant", this.playerId);
    }

    const correct = guess.toLowerCase() === state.word.toLowerCase();
    const points = correct ? config.correctWordPoints : -config.wrongWordPenalty;

    participant.score += points;
    state.mask = state.word;

    const completion = await completeSession(state, this.at, ctx, {
      timedOut: false,
      verdict: { guesser: this.playerId, correct },
      source: this.type,
    });
    const { session, rewards } = completion;

    logger?.info?.("Word guessed", {
      type: this.type,
      sessionId: session.id,
      playerId: this.playerId,
      correct,
      at: this.at,
    });

    await bus.publish(`session:${session.id}`, {
      type: "WordGuessed",
      sessionId: session.id,
      playerId: this.playerId,
      correct,
      points,
      at: this.at,
    });

    await announceCompletion(completion, this.at, ctx);

    return {
      success: correct,
      message: correct ? "Correct! You win the game" : "Incorrect guess. You lost the game",
      points,
      session: toSessionView(session, this.at),
      rewards,
    };
  }
}
