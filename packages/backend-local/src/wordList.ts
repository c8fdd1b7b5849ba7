import { readFile } from "node:fs/promises";

import { ValidationError, isPlayableWord, type Difficulty, type WordList } from "./core.js";

export function parseWordList(raw: unknown): WordList {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw ValidationError.because(["Word list must be an object keyed by difficulty"]);
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const issues: string[] = [];

  const tier = (difficulty: Difficulty): readonly string[] => {
    const words = entries.get(difficulty);
    if (!Array.isArray(words)) {
      issues.push(`${difficulty} must be an array of words`);
      return [];
    }
    const playable = words.filter(
      (word): word is string => typeof word === "string" && isPlayableWord(word),
    );
    if (playable.length !== words.length) {
      issues.push(`${difficulty} contains entries that are not alphabetic words`);
    }
    return playable;
  };

  const list: WordList = { easy: tier("easy"), medium: tier("medium"), hard: tier("hard") };
  if (issues.length > 0) {
    throw ValidationError.because(issues);
  }
  return list;
}

export async function loadWordList(path: string | URL): Promise<WordList> {
  const contents = await readFile(path, "utf8");
  return parseWordList(JSON.parse(contents));
}
