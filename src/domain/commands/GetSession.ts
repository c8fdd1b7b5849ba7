import { toSessionView, type SessionView } from "../entities/SessionRules.js";
import type { ValidSessionState } from "../ports/SessionGateway.js";
import type { SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { expireIfDue } from "./SessionTransitions.js";

/**
 * Public view of one session. An expired active session is completed on the
 * spot and returned in its completed form.
 */
export class GetSession extends Command<SessionView> {
  readonly type = "GetSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<SessionView> {
    const { sessionCache, sessionGateway } = ctx;

    let state: ValidSessionState | undefined = await sessionCache.getSnapshot(this.sessionId);
    if (state === undefined) {
      state = await sessionGateway.loadSessionState(this.sessionId);
      if (state.status !== "completed") {
        await sessionCache.refresh(state);
      }
    }

    const expiry = await expireIfDue(state, this.at, ctx);
    return toSessionView(expiry?.session ?? state, this.at);
  }
}
