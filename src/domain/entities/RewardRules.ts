import type { RewardConfig } from "../GameConfig.js";
import type { Participant } from "../ports/SessionGateway.js";
import type { Difficulty, Outcome, PlayerId } from "../typedefs.js";

/** A full-word guess decides the winner regardless of scores. */
export interface WordGuessVerdict {
  readonly guesser: PlayerId;
  readonly correct: boolean;
}

export interface RewardInput {
  readonly difficulty: Difficulty;
  readonly word: string;
  /** Final mask has no hidden letter, whether uncovered by play or disclosed */
  readonly solved: boolean;
  readonly timedOut: boolean;
  readonly elapsedMs: number;
  readonly budgetMs: number;
  readonly participants: readonly Participant[];
  readonly verdict?: WordGuessVerdict;
}

export interface ParticipantReward {
  readonly playerId: PlayerId;
  /** 0 = highest score */
  readonly rank: number;
  readonly score: number;
  readonly outcome: Outcome;
  readonly xp: number;
  readonly coins: number;
}

/** Participants by descending score; ties keep join order. */
export function rankParticipants(participants: readonly Participant[]): Participant[] {
  return [...participants].sort((a, b) => b.score - a.score || a.joinOrder - b.joinOrder);
}

export function timeBonus(
  input: Pick<RewardInput, "timedOut" | "elapsedMs" | "budgetMs">,
  config: RewardConfig,
): number {
  if (input.timedOut || input.elapsedMs >= input.budgetMs) return 0;
  return config.maxTimeBonusXp * (1 - Math.max(0, input.elapsedMs) / input.budgetMs);
}

export function decideOutcome(
  participant: Participant,
  rank: number,
  ranked: readonly Participant[],
  verdict: WordGuessVerdict | undefined,
): Outcome {
  if (verdict) {
    const isGuesser = participant.playerId === verdict.guesser;
    return isGuesser === verdict.correct ? "win" : "lose";
  }

  const [first, second] = ranked;
  if (ranked.length === 2 && first && second && first.score === second.score) {
    return "draw";
  }

  return rank === 0 ? "win" : "lose";
}

export function computeRewards(
  input: RewardInput,
  config: RewardConfig,
): ParticipantReward[] {
  const multiplier = config.difficultyMultipliers[input.difficulty];
  const lengthModifier = input.word.length / config.wordLengthDivisor;
  const cleanFinish = input.solved && !input.timedOut;
  const completionXp = cleanFinish ? config.completionXp * multiplier : 0;
  const completionCoins = cleanFinish ? config.completionCoins * multiplier : 0;
  const bonus = timeBonus(input, config);

  const ranked = rankParticipants(input.participants);

  return ranked.map((participant, rank) => {
    const rankXp = config.rankXp[rank] ?? 0;
    const scoreXp = Math.max(0, Math.floor(participant.score / 5));
    const rawXp =
      (rankXp + scoreXp + completionXp + bonus + config.participationXp) *
      multiplier *
      lengthModifier;
    const xp = Math.max(Math.trunc(rawXp), config.minimumXp);
    const coins = Math.trunc((config.rankCoins[rank] ?? 0) * multiplier + completionCoins);

    return {
      playerId: participant.playerId,
      rank,
      score: participant.score,
      outcome: decideOutcome(participant, rank, ranked, input.verdict),
      xp,
      coins,
    };
  });
}
