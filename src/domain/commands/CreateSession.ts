import { createMask, isPlayableWord, toSessionView, type SessionView } from "../entities/SessionRules.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { ValidationError } from "../errors/ValidationError.js";
import { isDifficulty, type Difficulty, type PlayerId, type TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { releaseIfExpired } from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

export class CreateSession extends Command<SessionView> {
  readonly type = "CreateSession" as const;

  constructor(
    public readonly creator: PlayerId,
    public readonly difficulty: Difficulty,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidPlayerId(creator)) issues.push(PLAYER_ID_ISSUE);
    if (!isDifficulty(difficulty)) issues.push("Difficulty must be one of easy, medium, hard");
    if (issues.length > 0) {
      throw ValidationError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<SessionView> {
    const { sessionGateway, wordSource, bus, logger } = ctx;

    const openSessionId = await sessionGateway.findOpenSessionId(this.creator);
    if (openSessionId !== undefined && !(await releaseIfExpired(openSessionId, this.at, ctx))) {
      throw new StateConflictError(
        "already-open",
        "You are already in an active or waiting session",
        openSessionId,
      );
    }

    const word = await wordSource.randomWord(this.difficulty);
    if (word === undefined) {
      throw new NotFoundError("Word", this.difficulty);
    }
    if (!isPlayableWord(word)) {
      throw ValidationError.because([`Word source returned an unplayable word for ${this.difficulty}`]);
    }

    const state = await sessionGateway.createSession({
      creator: this.creator,
      difficulty: this.difficulty,
      word,
      mask: createMask(word),
      createdAt: this.at,
    });

    logger?.info?.("Session created", {
      type: this.type,
      sessionId: state.id,
      creator: this.creator,
      difficulty: this.difficulty,
      at: this.at,
    });

    await bus.publish(`session:${state.id}`, {
      type: "SessionCreated",
      sessionId: state.id,
      creator: this.creator,
      difficulty: this.difficulty,
      mask: state.mask,
      at: this.at,
    });

    return toSessionView(state, this.at);
  }
}
