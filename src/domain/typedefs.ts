/**
 * Core domain typedefs shared by commands, rules and adapters.
 * Plain aliases; identifiers are opaque strings minted by the gateway.
 */

/** Unique identifier of a session */
export type SessionId = string;

/** Unique identifier of a player */
export type PlayerId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Difficulty tier: controls word selection, time budget and reward multiplier */
export type Difficulty = "easy" | "medium" | "hard";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

/** Session lifecycle; transitions only move forward */
export type SessionStatus = "waiting" | "active" | "completed";

export const SESSION_STATUSES: readonly SessionStatus[] = [
  "waiting",
  "active",
  "completed",
];

/** Per-player result of a completed session */
export type Outcome = "win" | "lose" | "draw";

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === "string" && (DIFFICULTIES as readonly string[]).includes(value);
}

export function isSessionStatus(value: unknown): value is SessionStatus {
  return (
    typeof value === "string" && (SESSION_STATUSES as readonly string[]).includes(value)
  );
}
