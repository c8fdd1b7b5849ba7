import { describe, expect, it, vi } from "vitest";

import { InMemoryCacheStore } from "../../src/adapters/in-memory/InMemoryCacheStore.js";
import { SessionCache } from "../../src/domain/cache/SessionCache.js";
import { createGameConfig } from "../../src/domain/GameConfig.js";
import type { CacheStore } from "../../src/domain/ports/CacheStore.js";
import { buildSessionState, createClock, createLoggerMock } from "../support/mocks.js";

const { cache: cacheConfig } = createGameConfig();

function createCache() {
  const clock = createClock();
  const store = new InMemoryCacheStore(clock.now);
  const logger = createLoggerMock();
  return { clock, store, logger, cache: new SessionCache(store, cacheConfig, logger) };
}

describe("SessionCache", () => {
  it("points every participant of an active session at its snapshot", async () => {
    const { cache } = createCache();
    const state = buildSessionState();

    await cache.remember(state);

    await expect(cache.lookupPointer("alice")).resolves.toEqual({
      kind: "session",
      sessionId: "session-1",
    });
    await expect(cache.lookupPointer("bob")).resolves.toEqual({
      kind: "session",
      sessionId: "session-1",
    });
    await expect(cache.getSnapshot("session-1")).resolves.toEqual(state);
  });

  it("keeps only the snapshot of a waiting session", async () => {
    const { cache } = createCache();

    await cache.remember(
      buildSessionState({
        status: "waiting",
        currentTurn: undefined,
        startedAt: undefined,
        endsAt: undefined,
      }),
    );

    await expect(cache.lookupPointer("alice")).resolves.toEqual({ kind: "unknown" });
    await expect(cache.getSnapshot("session-1")).resolves.toMatchObject({ status: "waiting" });
  });

  it("remembers a miss until its short TTL runs out", async () => {
    const { cache, clock } = createCache();

    await cache.rememberNoActiveSession("carol");
    await expect(cache.lookupPointer("carol")).resolves.toEqual({ kind: "none" });

    clock.advance(cacheConfig.missTtlMs);
    await expect(cache.lookupPointer("carol")).resolves.toEqual({ kind: "unknown" });
  });

  it("evicts the snapshot and every pointer on forget", async () => {
    const { cache, store } = createCache();
    const state = buildSessionState();
    await cache.remember(state);

    await cache.forget(state);

    expect(store.size).toBe(0);
  });

  it("discards a snapshot that cannot be read back", async () => {
    const { cache, store, logger } = createCache();
    await store.set(SessionCache.snapshotKey("session-1"), "{not json", 1_000);

    await expect(cache.getSnapshot("session-1")).resolves.toBeUndefined();

    expect(logger.warn).toHaveBeenCalledWith(
      "Discarding unreadable session snapshot",
      expect.objectContaining({ sessionId: "session-1" }),
    );
    await expect(store.get(SessionCache.snapshotKey("session-1"))).resolves.toBeUndefined();
  });

  it("treats a failing store as a miss", async () => {
    const failing: CacheStore = {
      get: vi.fn<CacheStore["get"]>().mockRejectedValue(new Error("connection refused")),
      set: vi.fn<CacheStore["set"]>().mockRejectedValue(new Error("connection refused")),
      delete: vi.fn<CacheStore["delete"]>().mockRejectedValue(new Error("connection refused")),
    };
    const logger = createLoggerMock();
    const cache = new SessionCache(failing, cacheConfig, logger);

    await expect(cache.lookupPointer("alice")).resolves.toEqual({ kind: "unknown" });
    await expect(cache.remember(buildSessionState())).resolves.toBeUndefined();
    await expect(cache.forget(buildSessionState())).resolves.toBeUndefined();

    expect(logger.warn).toHaveBeenCalledWith(
      "Session cache read failed; falling back to store",
      expect.objectContaining({ key: "session:pointer:alice" }),
    );
  });
});
