import { computeRewards, type ParticipantReward, type WordGuessVerdict } from "../entities/RewardRules.js";
import { hasHiddenLetters, sessionDurationMs } from "../entities/SessionRules.js";
import type { ValidSessionState } from "../ports/SessionGateway.js";
import type { PlayerId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

export interface LevelUpNotice {
  readonly playerId: PlayerId;
  readonly newLevel: number;
  readonly levelsGained: number;
  readonly xpGained: number;
}

export interface RewardSummary {
  readonly rewards: readonly ParticipantReward[];
  readonly levelUps: readonly LevelUpNotice[];
}

export interface RewardOptions {
  readonly timedOut: boolean;
  readonly verdict?: WordGuessVerdict;
}

type RewardContext = Pick<
  CommandContext,
  "sessionGateway" | "progressionLedger" | "config" | "logger"
>;

/**
 * Applies XP and coins to every participant of a just-completed session and
 * writes one outcome record per participant. Called once, by the writer whose
 * save committed the completion.
 */
export async function distributeRewards(
  state: ValidSessionState,
  options: RewardOptions,
  { sessionGateway, progressionLedger, config, logger }: RewardContext,
): Promise<RewardSummary> {
  if (state.startedAt === undefined || state.participants.length < 2) {
    logger?.info?.("Rewards skipped; session never started", {
      sessionId: state.id,
      participants: state.participants.length,
    });
    return { rewards: [], levelUps: [] };
  }

  const completedAt = state.completedAt ?? state.updatedAt;
  const rewards = computeRewards(
    {
      difficulty: state.difficulty,
      word: state.word,
      solved: !hasHiddenLetters(state.mask),
      timedOut: options.timedOut,
      elapsedMs: completedAt - state.startedAt,
      budgetMs: sessionDurationMs(config, state.difficulty),
      participants: state.participants,
      ...(options.verdict ? { verdict: options.verdict } : {}),
    },
    config.rewards,
  );

  const levelUps: LevelUpNotice[] = [];
  for (const reward of rewards) {
    const grant = await progressionLedger.addXp(reward.playerId, reward.xp);
    if (reward.coins > 0) {
      await progressionLedger.addCoins(reward.playerId, reward.coins);
    }

    if (grant.leveledUp) {
      levelUps.push({
        playerId: reward.playerId,
        newLevel: grant.progression.level,
        levelsGained: grant.levelsGained,
        xpGained: reward.xp,
      });
    }

    await sessionGateway.appendOutcome({
      sessionId: state.id,
      playerId: reward.playerId,
      score: reward.score,
      outcome: reward.outcome,
      word: state.word,
      finalMask: state.mask,
      at: completedAt,
    });
  }

  logger?.info?.("Rewards distributed", {
    sessionId: state.id,
    rewards,
    levelUps,
  });

  return { rewards, levelUps };
}
