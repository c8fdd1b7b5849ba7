import type { PlayerId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidPlayerId(id: unknown): id is PlayerId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export const PLAYER_ID_ISSUE = "Player identifier must be a non-empty string without whitespace";
