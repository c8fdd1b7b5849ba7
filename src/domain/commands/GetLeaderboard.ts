import { ValidationError } from "../errors/ValidationError.js";
import type { LeaderboardEntry } from "../ports/ProgressionLedger.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export const DEFAULT_LEADERBOARD_SIZE = 10;

export class GetLeaderboard extends Command<readonly LeaderboardEntry[]> {
  readonly type = "GetLeaderboard" as const;

  constructor(
    public readonly at: TimePoint,
    public readonly limit: number = DEFAULT_LEADERBOARD_SIZE,
  ) {
    super();

    if (!Number.isInteger(limit) || limit < 1) {
      throw ValidationError.because(["Leaderboard limit must be a positive integer"]);
    }
  }

  async execute({ progressionLedger }: CommandContext): Promise<readonly LeaderboardEntry[]> {
    return progressionLedger.leaderboard(this.limit);
  }
}
