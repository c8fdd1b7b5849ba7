import type { SessionId, TimePoint } from "../typedefs.js";

export class ExpiredError extends Error {
  constructor(
    public readonly sessionId: SessionId,
    public readonly endsAt: TimePoint,
  ) {
    super(`Session ${sessionId} has expired`);
    this.name = "ExpiredError";
  }
}
