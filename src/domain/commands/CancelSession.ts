import { toSessionView, type SessionView } from "../entities/SessionRules.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceCompletion, completeSession } from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

/** Lets the creator close a lobby nobody has filled; no rewards are paid. */
export class CancelSession extends Command<SessionView> {
  readonly type = "CancelSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isValidPlayerId(playerId)) {
      throw ValidationError.because([PLAYER_ID_ISSUE]);
    }
  }

  async execute(ctx: CommandContext): Promise<SessionView> {
    const state = await ctx.sessionGateway.loadSessionState(this.sessionId);

    if (state.creator !== this.playerId) {
      throw new StateConflictError("not-creator", "Only the creator can cancel a session", state.id);
    }
    if (state.status === "completed") {
      throw new StateConflictError("terminal", "Session is already completed", state.id);
    }
    if (state.status !== "waiting") {
      throw new StateConflictError("not-cancellable", "Only a waiting session can be cancelled", state.id);
    }

    const completion = await completeSession(state, this.at, ctx, {
      timedOut: false,
      source: this.type,
    });
    await announceCompletion(completion, this.at, ctx);

    return toSessionView(completion.session, this.at);
  }
}
