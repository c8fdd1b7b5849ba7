import { xpProgress, type XpProgress } from "../entities/Progression.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { PlayerProgression } from "../ports/ProgressionLedger.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

export type PlayerProgress = PlayerProgression & XpProgress;

export class GetPlayerProgress extends Command<PlayerProgress> {
  readonly type = "GetPlayerProgress" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isValidPlayerId(playerId)) {
      throw ValidationError.because([PLAYER_ID_ISSUE]);
    }
  }

  async execute({ progressionLedger }: CommandContext): Promise<PlayerProgress> {
    const progression = await progressionLedger.getProgression(this.playerId);
    return { ...progression, ...xpProgress(progression) };
  }
}
