import { toSessionView, type SessionView } from "../entities/SessionRules.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { resolveActiveSession } from "./ActiveSession.js";
import { assertPlayable } from "./SessionTransitions.js";

export class GetActiveSession extends Command<SessionView> {
  readonly type = "GetActiveSession" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<SessionView> {
    const resolved = await resolveActiveSession(this.playerId, ctx);
    const active = await assertPlayable(resolved, this.at, ctx);
    return toSessionView(active, this.at);
  }
}
