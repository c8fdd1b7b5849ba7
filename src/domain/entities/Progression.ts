import type { PlayerProgression, XpGrant } from "../ports/ProgressionLedger.js";
import type { PlayerId } from "../typedefs.js";

/** XP cost of leaving level 1; each following level costs {@link LEVEL_XP_STEP} more. */
export const BASE_LEVEL_XP = 100;
export const LEVEL_XP_STEP = 50;

export function createProgression(playerId: PlayerId): PlayerProgression {
  return { playerId, level: 1, xp: 0, coins: 0 };
}

/**
 * Cumulative XP needed to reach `level`:
 * sum over lvl in 1..level-1 of BASE_LEVEL_XP + (lvl - 1) * LEVEL_XP_STEP.
 */
export function xpRequiredForLevel(level: number): number {
  if (level <= 1) return 0;

  let total = 0;
  for (let lvl = 1; lvl < level; lvl += 1) {
    total += BASE_LEVEL_XP + (lvl - 1) * LEVEL_XP_STEP;
  }
  return total;
}

/** Adds XP and climbs every level whose threshold is now met. */
export function applyXp(progression: PlayerProgression, amount: number): XpGrant {
  if (!(amount > 0)) {
    return { leveledUp: false, levelsGained: 0, progression };
  }

  const xp = progression.xp + amount;
  let level = progression.level;
  while (xp >= xpRequiredForLevel(level + 1)) {
    level += 1;
  }

  const levelsGained = level - progression.level;
  return {
    leveledUp: levelsGained > 0,
    levelsGained,
    progression: { ...progression, xp, level },
  };
}

export interface CoinChange {
  readonly applied: boolean;
  readonly progression: PlayerProgression;
}

export function creditCoins(progression: PlayerProgression, amount: number): CoinChange {
  if (!(amount > 0)) return { applied: false, progression };
  return {
    applied: true,
    progression: { ...progression, coins: progression.coins + amount },
  };
}

export function debitCoins(progression: PlayerProgression, amount: number): CoinChange {
  if (!(amount > 0) || amount > progression.coins) return { applied: false, progression };
  return {
    applied: true,
    progression: { ...progression, coins: progression.coins - amount },
  };
}

export interface XpProgress {
  readonly xpIntoLevel: number;
  readonly xpForNextLevel: number;
  /** 0..100 */
  readonly percent: number;
}

export function xpProgress({ level, xp }: PlayerProgression): XpProgress {
  const floor = xpRequiredForLevel(level);
  const xpForNextLevel = xpRequiredForLevel(level + 1) - floor;
  const xpIntoLevel = xp - floor;
  const percent =
    xpForNextLevel > 0 ? Math.min((xpIntoLevel / xpForNextLevel) * 100, 100) : 100;
  return { xpIntoLevel, xpForNextLevel, percent };
}
