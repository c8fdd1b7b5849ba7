import { findParticipant, toSessionView, type SessionView } from "../entities/SessionRules.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { Participant, SessionState } from "../ports/SessionGateway.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { activateSession, commitSession, releaseIfExpired } from "./SessionTransitions.js";
import { isValidPlayerId, PLAYER_ID_ISSUE } from "./validation.js";

export interface JoinSessionResult {
  readonly participant: Participant;
  readonly session: SessionView;
}

export class JoinSession extends Command<JoinSessionResult> {
  readonly type = "JoinSession" as const;

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

  async execute(ctx: CommandContext): Promise<JoinSessionResult> {
    const { sessionGateway, sessionCache, bus, logger, config } = ctx;

    const loaded = await sessionGateway.loadSessionState(this.sessionId);

    if (loaded.status === "completed") {
      throw new StateConflictError("terminal", "Session is already completed", loaded.id);
    }
    if (loaded.status !== "waiting") {
      throw new StateConflictError(
        "not-joinable",
        "Cannot join a session that is not waiting for players",
        loaded.id,
      );
    }
    if (findParticipant(loaded, this.playerId)) {
      throw new StateConflictError("already-joined", "You are already in this session", loaded.id);
    }

    const openIn = await sessionGateway.findOpenSessionId(this.playerId);
    if (openIn !== undefined && !(await releaseIfExpired(openIn, this.at, ctx))) {
      throw new StateConflictError(
        "already-playing",
        "You are already in another open session",
        openIn,
      );
    }

    const state: SessionState = loaded;
    const participant: Participant = {
      playerId: this.playerId,
      score: 0,
      joinOrder: Math.max(-1, ...state.participants.map(({ joinOrder }) => joinOrder)) + 1,
      joinedAt: this.at,
    };
    state.participants = [...state.participants, participant];
    state.updatedAt = this.at;

    const activating = state.participants.length >= config.playersToStart;
    if (activating) {
      activateSession(state, this.at, ctx);
    }

    const committed = await commitSession(state, ctx);
    if (activating) {
      await sessionCache.remember(committed);
    }

    logger?.info?.("Player joined session", {
      type: this.type,
      sessionId: committed.id,
      playerId: this.playerId,
      at: this.at,
      status: committed.status,
    });

    await bus.publish(`session:${committed.id}`, {
      type: "PlayerJoined",
      sessionId: committed.id,
      playerId: this.playerId,
      at: this.at,
      players: committed.participants.map(({ playerId }) => playerId),
    });

    if (committed.status === "active") {
      await bus.publish(`session:${committed.id}`, {
        type: "SessionActivated",
        sessionId: committed.id,
        at: this.at,
        currentTurn: committed.currentTurn,
        endsAt: committed.endsAt,
        mask: committed.mask,
      });
    }

    return { participant, session: toSessionView(committed, this.at) };
  }
}
