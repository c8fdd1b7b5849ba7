import type { OutcomeRecord } from "../ports/SessionGateway.js";
import type { SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class GetOutcomes extends Command<readonly OutcomeRecord[]> {
  readonly type = "GetOutcomes" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessionGateway }: CommandContext): Promise<readonly OutcomeRecord[]> {
    await sessionGateway.loadSessionState(this.sessionId);
    return sessionGateway.listOutcomes(this.sessionId);
  }
}
