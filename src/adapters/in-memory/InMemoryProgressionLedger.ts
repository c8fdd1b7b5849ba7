/* eslint-disable functional/immutable-data */
import {
  applyXp,
  createProgression,
  creditCoins,
  debitCoins,
} from "../../domain/entities/Progression.js";
import type {
  CoinTransfer,
  LeaderboardEntry,
  PlayerProgression,
  ProgressionLedger,
  XpGrant,
} from "../../domain/ports/ProgressionLedger.js";
import type { PlayerId } from "../../domain/typedefs.js";

export class InMemoryProgressionLedger implements ProgressionLedger {
  #players = new Map<PlayerId, PlayerProgression>();

  constructor(seed: readonly PlayerProgression[] = []) {
    for (const progression of seed) {
      this.#players.set(progression.playerId, { ...progression });
    }
  }

  async getProgression(playerId: PlayerId): Promise<PlayerProgression> {
    return { ...this.#get(playerId) };
  }

  async addXp(playerId: PlayerId, amount: number): Promise<XpGrant> {
    const grant = applyXp(this.#get(playerId), amount);
    this.#players.set(playerId, grant.progression);
    return { ...grant, progression: { ...grant.progression } };
  }

  async addCoins(playerId: PlayerId, amount: number): Promise<CoinTransfer> {
    const { applied, progression } = creditCoins(this.#get(playerId), amount);
    this.#players.set(playerId, progression);
    return { applied, balance: progression.coins };
  }

  async deductCoins(playerId: PlayerId, amount: number): Promise<CoinTransfer> {
    const { applied, progression } = debitCoins(this.#get(playerId), amount);
    this.#players.set(playerId, progression);
    return { applied, balance: progression.coins };
  }

  async leaderboard(limit: number): Promise<readonly LeaderboardEntry[]> {
    return [...this.#players.values()]
      .sort((a, b) => b.xp - a.xp || a.playerId.localeCompare(b.playerId))
      .slice(0, limit)
      .map(({ playerId, xp, level }) => ({ playerId, xp, level }));
  }

  #get(playerId: PlayerId): PlayerProgression {
    return this.#players.get(playerId) ?? createProgression(playerId);
  }
}
