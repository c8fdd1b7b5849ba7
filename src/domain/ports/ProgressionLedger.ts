import type { PlayerId } from "../typedefs.js";

/** Persistent level/experience/currency state of a player */
export interface PlayerProgression {
  readonly playerId: PlayerId;
  /** Current level, starting at 1 */
  readonly level: number;
  /** Cumulative experience */
  readonly xp: number;
  /** Currency balance */
  readonly coins: number;
}

export interface XpGrant {
  readonly leveledUp: boolean;
  readonly levelsGained: number;
  readonly progression: PlayerProgression;
}

export interface CoinTransfer {
  /** False when the amount was rejected and the balance left untouched */
  readonly applied: boolean;
  readonly balance: number;
}

export interface LeaderboardEntry {
  readonly playerId: PlayerId;
  readonly xp: number;
  readonly level: number;
}

/**
 * Owner of experience, level and currency arithmetic.
 * Every mutation must be atomic per player.
 */
export interface ProgressionLedger {
  getProgression(playerId: PlayerId): Promise<PlayerProgression>;
  addXp(playerId: PlayerId, amount: number): Promise<XpGrant>;
  addCoins(playerId: PlayerId, amount: number): Promise<CoinTransfer>;
  /** Rejected (not applied) when the amount is non-positive or exceeds the balance. */
  deductCoins(playerId: PlayerId, amount: number): Promise<CoinTransfer>;
  /** Players ordered by cumulative experience, highest first */
  leaderboard(limit: number): Promise<readonly LeaderboardEntry[]>;
}
