import type { SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { expireIfDue } from "./SessionTransitions.js";

/** Completes every active session whose deadline has passed. Returns their ids. */
export class ExpireStaleSessions extends Command<readonly SessionId[]> {
  readonly type = "ExpireStaleSessions" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute(ctx: CommandContext): Promise<readonly SessionId[]> {
    const { sessionGateway, logger } = ctx;
    const expired: SessionId[] = [];

    for (const sessionId of await sessionGateway.listSessionIds("active")) {
      const state = await sessionGateway.loadSessionState(sessionId);
      const completion = await expireIfDue(state, this.at, ctx);
      if (completion) expired.push(sessionId);
    }

    if (expired.length > 0) {
      logger?.info?.("Expired stale sessions", { type: this.type, expired, at: this.at });
    }

    return expired;
  }
}
