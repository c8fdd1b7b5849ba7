import { toSessionView, type SessionView } from "../entities/SessionRules.js";
import { isSessionStatus, type SessionStatus, type TimePoint } from "../typedefs.js";
import { ValidationError } from "../errors/ValidationError.js";
import { Command, type CommandContext } from "./Command.js";
import { ExpireStaleSessions } from "./ExpireStaleSessions.js";

/** Sessions newest first, optionally filtered by status, after an expiry sweep. */
export class ListSessions extends Command<readonly SessionView[]> {
  readonly type = "ListSessions" as const;

  constructor(
    public readonly at: TimePoint,
    public readonly status?: SessionStatus,
  ) {
    super();

    if (status !== undefined && !isSessionStatus(status)) {
      throw ValidationError.because(["Status must be one of waiting, active, completed"]);
    }
  }

  async execute(ctx: CommandContext): Promise<readonly SessionView[]> {
    const { sessionGateway } = ctx;

    await new ExpireStaleSessions(this.at).execute(ctx);

    const ids = await sessionGateway.listSessionIds(this.status);
    const sessions = await Promise.all(ids.map((id) => sessionGateway.loadSessionState(id)));

    return sessions
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((state) => toSessionView(state, this.at));
  }
}
