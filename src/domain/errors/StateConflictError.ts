import type { SessionId } from "../typedefs.js";

export type StateConflictReason =
  | "not-active"
  | "terminal"
  | "not-your-turn"
  | "already-joined"
  | "not-joinable"
  | "already-open"
  | "already-playing"
  | "nothing-to-reveal"
  | "not-creator"
  | "not-cancellable"
  | "stale";

export class StateConflictError extends Error {
  constructor(
    public readonly reason: StateConflictReason,
    message: string,
    public readonly sessionId?: SessionId,
  ) {
    super(message);
    this.name = "StateConflictError";
  }

  static stale(sessionId: SessionId): StateConflictError {
    return new StateConflictError(
      "stale",
      `Session ${sessionId} was modified concurrently`,
      sessionId,
    );
  }
}
