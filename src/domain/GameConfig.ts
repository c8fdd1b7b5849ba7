import { ValidationError } from "./errors/ValidationError.js";
import { DIFFICULTIES, type Difficulty } from "./typedefs.js";

/** Who receives the first turn when a session activates */
export type TurnAssignment = "first-joiner" | "random";

/** How many matching positions a correct letter guess uncovers */
export type LetterRevealPolicy = "all-occurrences" | "first-occurrence";

/** What happens when a letter that was already guessed is submitted again */
export type RepeatedGuessPolicy = "reject" | "rescore";

export interface RewardConfig {
  readonly difficultyMultipliers: Readonly<Record<Difficulty, number>>;
  /** XP by rank (index 0 = top score); ranks beyond the list earn 0 */
  readonly rankXp: readonly number[];
  /** Coins by rank before the difficulty multiplier */
  readonly rankCoins: readonly number[];
  readonly participationXp: number;
  readonly minimumXp: number;
  readonly maxTimeBonusXp: number;
  readonly completionXp: number;
  readonly completionCoins: number;
  readonly wordLengthDivisor: number;
}

export interface SessionCacheConfig {
  /** Lifetime of player → active session pointers */
  readonly pointerTtlMs: number;
  /** Lifetime of session snapshots */
  readonly snapshotTtlMs: number;
  /** Lifetime of "no active session" markers */
  readonly missTtlMs: number;
}

export interface GameConfig {
  /** Participants needed to activate a waiting session */
  readonly playersToStart: number;
  readonly durationsMs: Readonly<Record<Difficulty, number>>;
  readonly correctLetterPoints: number;
  readonly wrongLetterPenalty: number;
  readonly correctWordPoints: number;
  readonly wrongWordPenalty: number;
  readonly minWordGuessLength: number;
  readonly maxWordGuessLength: number;
  readonly revealCost: number;
  readonly turnAssignment: TurnAssignment;
  readonly letterReveal: LetterRevealPolicy;
  readonly repeatedGuess: RepeatedGuessPolicy;
  readonly rewards: RewardConfig;
  readonly cache: SessionCacheConfig;
}

export type GameConfigOverrides = Partial<
  Omit<GameConfig, "durationsMs" | "rewards" | "cache">
> & {
  readonly durationsMs?: Partial<Record<Difficulty, number>>;
  readonly rewards?: Partial<RewardConfig>;
  readonly cache?: Partial<SessionCacheConfig>;
};

const MINUTE_MS = 60_000;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const config: GameConfig = {
    playersToStart: overrides.playersToStart ?? 2,
    durationsMs: {
      easy: overrides.durationsMs?.easy ?? 10 * MINUTE_MS,
      medium: overrides.durationsMs?.medium ?? 7 * MINUTE_MS,
      hard: overrides.durationsMs?.hard ?? 5 * MINUTE_MS,
    },
    correctLetterPoints: overrides.correctLetterPoints ?? 20,
    wrongLetterPenalty: overrides.wrongLetterPenalty ?? 10,
    correctWordPoints: overrides.correctWordPoints ?? 100,
    wrongWordPenalty: overrides.wrongWordPenalty ?? 50,
    minWordGuessLength: overrides.minWordGuessLength ?? 3,
    maxWordGuessLength: overrides.maxWordGuessLength ?? 100,
    revealCost: overrides.revealCost ?? 30,
    turnAssignment: overrides.turnAssignment ?? "first-joiner",
    letterReveal: overrides.letterReveal ?? "all-occurrences",
    repeatedGuess: overrides.repeatedGuess ?? "reject",
    rewards: {
      difficultyMultipliers: { easy: 1, medium: 1.5, hard: 2 },
      rankXp: [50, 30],
      rankCoins: [50, 30],
      participationXp: 10,
      minimumXp: 15,
      maxTimeBonusXp: 50,
      completionXp: 30,
      completionCoins: 10,
      wordLengthDivisor: 5,
      ...overrides.rewards,
    },
    cache: {
      pointerTtlMs: 10 * MINUTE_MS,
      snapshotTtlMs: 15 * MINUTE_MS,
      missTtlMs: MINUTE_MS,
      ...overrides.cache,
    },
  };

  const issues = validateGameConfig(config);
  if (issues.length > 0) {
    throw ValidationError.because(issues);
  }

  return config;
}

export function validateGameConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (!Number.isInteger(config.playersToStart) || config.playersToStart < 2) {
    issues.push("playersToStart must be an integer greater than or equal to 2");
  }

  for (const difficulty of DIFFICULTIES) {
    if (!isPositive(config.durationsMs[difficulty])) {
      issues.push(`durationsMs.${difficulty} must be greater than 0`);
    }
    if (!isPositive(config.rewards.difficultyMultipliers[difficulty])) {
      issues.push(`rewards.difficultyMultipliers.${difficulty} must be greater than 0`);
    }
  }

  const points = [
    ["correctLetterPoints", config.correctLetterPoints],
    ["wrongLetterPenalty", config.wrongLetterPenalty],
    ["correctWordPoints", config.correctWordPoints],
    ["wrongWordPenalty", config.wrongWordPenalty],
  ] as const;
  for (const [name, value] of points) {
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer`);
    }
  }

  if (
    !Number.isInteger(config.minWordGuessLength) ||
    config.minWordGuessLength < 1 ||
    config.maxWordGuessLength < config.minWordGuessLength
  ) {
    issues.push("word guess length bounds must satisfy 1 <= min <= max");
  }

  if (!Number.isInteger(config.revealCost) || config.revealCost < 1) {
    issues.push("revealCost must be a positive integer");
  }

  if (!isPositive(config.rewards.wordLengthDivisor)) {
    issues.push("rewards.wordLengthDivisor must be greater than 0");
  }

  if (config.rewards.minimumXp < 0) {
    issues.push("rewards.minimumXp must not be negative");
  }

  const { pointerTtlMs, snapshotTtlMs, missTtlMs } = config.cache;
  if (!isPositive(pointerTtlMs) || !isPositive(snapshotTtlMs) || !isPositive(missTtlMs)) {
    issues.push("cache TTLs must be greater than 0");
  }

  return issues;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
