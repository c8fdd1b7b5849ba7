import type { GuessRecord } from "../ports/SessionGateway.js";
import type { SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Letter guesses of a session, most recent first. */
export class GetHistory extends Command<readonly GuessRecord[]> {
  readonly type = "GetHistory" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessionGateway }: CommandContext): Promise<readonly GuessRecord[]> {
    await sessionGateway.loadSessionState(this.sessionId);
    return sessionGateway.listGuesses(this.sessionId);
  }
}
