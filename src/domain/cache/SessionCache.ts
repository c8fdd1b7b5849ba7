/* eslint-disable functional/prefer-readonly-type */
import { assertValidSessionState } from "../entities/SessionRules.js";
import type { SessionCacheConfig } from "../GameConfig.js";
import type { CacheStore } from "../ports/CacheStore.js";
import type { Logger } from "../ports/Logger.js";
import type { SessionState, ValidSessionState } from "../ports/SessionGateway.js";
import type { PlayerId, SessionId } from "../typedefs.js";

/** Marker stored in a pointer entry meaning "looked up, no active session". */
const NO_SESSION = "";

export type ActivePointer =
  | { readonly kind: "session"; readonly sessionId: SessionId }
  | { readonly kind: "none" }
  | { readonly kind: "unknown" };

/**
 * Best-effort lookup layer in front of the session gateway:
 * player → active session id, and session id → last committed snapshot.
 *
 * Never authoritative. Callers commit through the gateway's versioned save, so
 * a stale snapshot fails the compare-and-swap instead of being acted upon.
 * Store failures are logged and reported as misses.
 */
export class SessionCache {
  readonly #store: CacheStore;
  readonly #config: SessionCacheConfig;
  readonly #logger: Logger | undefined;

  constructor(store: CacheStore, config: SessionCacheConfig, logger?: Logger) {
    this.#store = store;
    this.#config = config;
    this.#logger = logger;
  }

  static pointerKey(playerId: PlayerId): string {
    return `session:pointer:${playerId}`;
  }

  static snapshotKey(sessionId: SessionId): string {
    return `session:snapshot:${sessionId}`;
  }

  async lookupPointer(playerId: PlayerId): Promise<ActivePointer> {
    const value = await this.#read(SessionCache.pointerKey(playerId));
    if (value === undefined) return { kind: "unknown" };
    if (value === NO_SESSION) return { kind: "none" };
    return { kind: "session", sessionId: value };
  }

  async getSnapshot(sessionId: SessionId): Promise<ValidSessionState | undefined> {
    const raw = await this.#read(SessionCache.snapshotKey(sessionId));
    if (raw === undefined) return undefined;

    try {
      const state = JSON.parse(raw) as SessionState;
      assertValidSessionState(state);
      return state;
    } catch (error) {
      this.#logger?.warn?.("Discarding unreadable session snapshot", { sessionId, error });
      await this.#remove([SessionCache.snapshotKey(sessionId)]);
      return undefined;
    }
  }

  /** Refresh the snapshot after a committed mutation. */
  async refresh(state: SessionState): Promise<void> {
    await this.#write(
      SessionCache.snapshotKey(state.id),
      JSON.stringify(state),
      this.#config.snapshotTtlMs,
    );
  }

  /** Cache the snapshot and point every participant at the session. */
  async remember(state: SessionState): Promise<void> {
    await this.refresh(state);
    if (state.status !== "active") return;

    for (const { playerId } of state.participants) {
      await this.#write(
        SessionCache.pointerKey(playerId),
        state.id,
        this.#config.pointerTtlMs,
      );
    }
  }

  async rememberNoActiveSession(playerId: PlayerId): Promise<void> {
    await this.#write(SessionCache.pointerKey(playerId), NO_SESSION, this.#config.missTtlMs);
  }

  /** Evict the snapshot and the pointer of every participant. */
  async forget(state: SessionState): Promise<void> {
    await this.#remove([
      SessionCache.snapshotKey(state.id),
      ...state.participants.map(({ playerId }) => SessionCache.pointerKey(playerId)),
    ]);
  }

  async forgetPointer(playerId: PlayerId, sessionId?: SessionId): Promise<void> {
    const keys = [SessionCache.pointerKey(playerId)];
    if (sessionId !== undefined) keys.push(SessionCache.snapshotKey(sessionId));
    await this.#remove(keys);
  }

  async #read(key: string): Promise<string | undefined> {
    try {
      return await this.#store.get(key);
    } catch (error) {
      this.#logger?.warn?.("Session cache read failed; falling back to store", {
        key,
        error,
      });
      return undefined;
    }
  }

  async #write(key: string, value: string, ttlMs: number): Promise<void> {
    try {
      await this.#store.set(key, value, ttlMs);
    } catch (error) {
      this.#logger?.warn?.("Session cache write failed", { key, error });
    }
  }

  async #remove(keys: string[]): Promise<void> {
    try {
      await this.#store.delete(...keys);
    } catch (error) {
      this.#logger?.warn?.("Session cache eviction failed", { keys, error });
    }
  }
}
