import { describe, expect, it } from "vitest";

import { GetActiveSession } from "../src/domain/commands/GetActiveSession.js";
import { DEFAULT_LEADERBOARD_SIZE, GetLeaderboard } from "../src/domain/commands/GetLeaderboard.js";
import { GetOutcomes } from "../src/domain/commands/GetOutcomes.js";
import { GetPlayerProgress } from "../src/domain/commands/GetPlayerProgress.js";
import { GetSession } from "../src/domain/commands/GetSession.js";
import { NotFoundError, ValidationError } from "../src/domain/errors/index.js";
import type { PlayerProgression } from "../src/domain/ports/ProgressionLedger.js";
import { T0, createTestContext, startSession } from "./support/mocks.js";

describe("GetLeaderboard command", () => {
  it("returns the top ten by default", async () => {
    const progressions: PlayerProgression[] = Array.from({ length: 12 }, (_, index) => ({
      playerId: `player-${String(index).padStart(2, "0")}`,
      level: 1,
      xp: index * 10,
      coins: 0,
    }));
    const ctx = createTestContext({ progressions });

    const board = await new GetLeaderboard(T0).execute(ctx);

    expect(board).toHaveLength(DEFAULT_LEADERBOARD_SIZE);
    expect(board[0]).toEqual({ playerId: "player-11", xp: 110, level: 1 });
    expect(board.at(-1)).toEqual({ playerId: "player-02", xp: 20, level: 1 });
  });

  it("validates the limit", () => {
    expect(() => new GetLeaderboard(T0, 0)).toThrow(ValidationError);
    expect(() => new GetLeaderboard(T0, 2.5)).toThrow(
      "Leaderboard limit must be a positive integer",
    );
  });
});

describe("GetPlayerProgress command", () => {
  it("adds level progress to the stored progression", async () => {
    const ctx = createTestContext({
      progressions: [{ playerId: "alice", level: 2, xp: 175, coins: 5 }],
    });

    await expect(new GetPlayerProgress("alice", T0).execute(ctx)).resolves.toEqual({
      playerId: "alice",
      level: 2,
      xp: 175,
      coins: 5,
      xpIntoLevel: 75,
      xpForNextLevel: 150,
      percent: 50,
    });
  });
});

describe("GetActiveSession command", () => {
  it("returns the caller's session from the cache", async () => {
    const ctx = createTestContext();
    await startSession(ctx);

    const view = await new GetActiveSession("bob", T0 + 101_000).execute(ctx);

    expect(view).toMatchObject({ id: "session-1", status: "active", timeRemainingMs: 500_000 });
    expect(ctx.logger.debug).toHaveBeenCalledWith("Active session served from cache", {
      playerId: "bob",
      sessionId: "session-1",
    });
  });

  it("falls back to the store when the cache is empty", async () => {
    const ctx = createTestContext();
    await startSession(ctx);
    await ctx.cacheStore.delete("session:pointer:bob", "session:snapshot:session-1");

    const view = await new GetActiveSession("bob", T0 + 2_000).execute(ctx);

    expect(view.id).toBe("session-1");
    await expect(ctx.sessionCache.lookupPointer("bob")).resolves.toEqual({
      kind: "session",
      sessionId: "session-1",
    });
  });
});

describe("session lookups", () => {
  it("report unknown sessions", async () => {
    const ctx = createTestContext();

    await expect(new GetSession("session-404", T0).execute(ctx)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(new GetOutcomes("session-404", T0).execute(ctx)).rejects.toThrow(
      "Session not found: session-404",
    );
  });
});
