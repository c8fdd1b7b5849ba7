import { findParticipant } from "../entities/SessionRules.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import type { ValidSessionState } from "../ports/SessionGateway.js";
import type { PlayerId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

/**
 * Finds the active session of a player: pointer and snapshot from the cache
 * when both are present and still plausible, otherwise from the store (which
 * repopulates the cache, or records a short-lived miss).
 */
export async function resolveActiveSession(
  playerId: PlayerId,
  { sessionCache, sessionGateway, logger }: Pick<
    CommandContext,
    "sessionCache" | "sessionGateway" | "logger"
  >,
): Promise<ValidSessionState> {
  const pointer = await sessionCache.lookupPointer(playerId);

  if (pointer.kind === "none") {
    throw new NotFoundError("Active session", playerId);
  }

  if (pointer.kind === "session") {
    const snapshot = await sessionCache.getSnapshot(pointer.sessionId);
    if (
      snapshot !== undefined &&
      snapshot.status === "active" &&
      findParticipant(snapshot, playerId) !== undefined
    ) {
      logger?.debug?.("Active session served from cache", {
        playerId,
        sessionId: snapshot.id,
      });
      return snapshot;
    }
    await sessionCache.forgetPointer(playerId, pointer.sessionId);
  }

  const sessionId = await sessionGateway.findActiveSessionId(playerId);
  if (sessionId === undefined) {
    await sessionCache.rememberNoActiveSession(playerId);
    throw new NotFoundError("Active session", playerId);
  }

  const state = await sessionGateway.loadSessionState(sessionId);
  await sessionCache.remember(state);
  return state;
}
