import type { WordSource } from "../../domain/ports/WordSource.js";
import type { Difficulty } from "../../domain/typedefs.js";

export type WordList = Readonly<Record<Difficulty, readonly string[]>>;

export class InMemoryWordSource implements WordSource {
  readonly #words: WordList;
  readonly #random: () => number;

  constructor(words: WordList, random: () => number = Math.random) {
    this.#words = words;
    this.#random = random;
  }

  async randomWord(difficulty: Difficulty): Promise<string | undefined> {
    const candidates = this.#words[difficulty];
    if (candidates.length === 0) return undefined;
    return candidates[Math.floor(this.#random() * candidates.length)];
  }
}
