import type { Difficulty } from "../typedefs.js";

/**
 * Supplies secret words. Word-list administration lives outside the core;
 * resolves `undefined` when the tier has no words.
 */
export interface WordSource {
  randomWord(difficulty: Difficulty): Promise<string | undefined>;
}
