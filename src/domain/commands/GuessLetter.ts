import {
  findParticipant,
  hasHiddenLetters,
  nextTurn,
  revealLetter,
  toSessionView,
  type SessionView,
} from "../entities/SessionRules.js";
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
  completeSession,
  type SessionCompletion,
} from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

const LETTER_PATTERN = /^[A-Za-z]$/;

export interface LetterGuessResult {
  /** Whether the letter uncovered at least one position */
  readonly success: boolean;
  readonly message: string;
  readonly points: number;
  readonly session: SessionView;
  /** Present when this guess completed the session */
  readonly rewards?: RewardSummary;
}

export class GuessLetter extends Command<LetterGuessResult> {
  readonly type = "GuessLetter" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly letter: string,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidPlayerId(playerId)) issues.push(PLAYER_ID_ISSUE);
    if (typeof letter !== "string" || !LETTER_PATTERN.test(letter)) {
      issues.push("Letter must be a single alphabetic character");
    }
    if (issues.length > 0) {
      throw ValidationError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<LetterGuessResult> {
    const { sessionGateway, bus, logger, config } = ctx;

    const resolved = await resolveActiveSession(this.playerId, ctx);
    const active = await assertPlayable(resolved, this.at, ctx);

    if (active.currentTurn !== this.playerId) {
      throw new StateConflictError("not-your-turn", "Not your turn", active.id);
    }

    const state: SessionState = active;
    const participant = findParticipant(state, this.playerId);
    if (!participant) {
      throw new NotFoundError("Participant", this.playerId);
    }

    const letter = this.letter.toLowerCase();
    if (config.repeatedGuess === "reject" && state.guessedLetters.includes(letter)) {
      throw ValidationError.because([`Letter "${letter}" was already guessed`]);
    }

    const { mask, revealed } = revealLetter(state.word, state.mask, letter, config.letterReveal);
    const correct = revealed > 0;
    const points = correct ? config.correctLetterPoints : -config.wrongLetterPenalty;

    participant.score += points;
    state.mask = mask;
    state.updatedAt = this.at;
    if (!state.guessedLetters.includes(letter)) {
      state.guessedLetters = [...state.guessedLetters, letter];
    }

    let committed: ValidSessionState;
    let completion: SessionCompletion | undefined;
    if (hasHiddenLetters(mask)) {
      state.currentTurn = nextTurn(state);
      committed = await commitSession(state, ctx);
    } else {
      completion = await completeSession(state, this.at, ctx, {
        timedOut: false,
        source: this.type,
      });
      committed = completion.session;
    }

    await sessionGateway.appendGuess({
      sessionId: committed.id,
      playerId: this.playerId,
      letter,
      correct,
      points,
      at: this.at,
    });

    logger?.info?.("Letter guessed", {
      type: this.type,
      sessionId: committed.id,
      playerId: this.playerId,
      correct,
      points,
      at: this.at,
    });

    await bus.publish(`session:${committed.id}`, {
      type: "LetterGuessed",
      sessionId: committed.id,
      playerId: this.playerId,
      letter,
      correct,
      points,
      mask: committed.mask,
      currentTurn: committed.currentTurn,
      at: this.at,
    });

    if (completion) {
      await announceCompletion(completion, this.at, ctx);
    }

    return {
      success: correct,
      message: correct ? "Correct guess" : "Incorrect guess",
      points,
      session: toSessionView(committed, this.at),
      ...(completion ? { rewards: completion.rewards } : {}),
    };
  }
}
