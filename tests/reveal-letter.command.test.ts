import { describe, expect, it, vi } from "vitest";

import { GetSession } from "../src/domain/commands/GetSession.js";
import { GuessLetter } from "../src/domain/commands/GuessLetter.js";
import { RevealLetter } from "../src/domain/commands/RevealLetter.js";
import {
  InsufficientResourceError,
  StateConflictError,
} from "../src/domain/errors/index.js";
import { T0, createTestContext, publishedTypes, startSession } from "./support/mocks.js";

const withCoins = (coins: number) =>
  createTestContext({ progressions: [{ playerId: "alice", level: 1, xp: 0, coins }] });

describe("RevealLetter command", () => {
  it("charges for a seeded hidden position without taking the turn", async () => {
    const ctx = withCoins(100);
    await startSession(ctx);

    const result = await new RevealLetter("alice", T0 + 2_000).execute(ctx);

    expect(result).toMatchObject({
      position: 6,
      mask: "_____n",
      cost: 30,
      remainingBalance: 70,
      session: { status: "active", currentTurn: "alice", mask: "_____n" },
    });
    expect(ctx.bus.publish).toHaveBeenLastCalledWith("session:session-1", {
      type: "LetterRevealed",
      sessionId: "session-1",
      playerId: "alice",
      position: 6,
      mask: "_____n",
      at: T0 + 2_000,
    });
  });

  it("refuses when the balance does not cover the cost", async () => {
    const ctx = createTestContext({
      progressions: [{ playerId: "bob", level: 1, xp: 0, coins: 25 }],
    });
    await startSession(ctx);

    const attempt = new RevealLetter("bob", T0 + 2_000).execute(ctx);

    await expect(attempt).rejects.toBeInstanceOf(InsufficientResourceError);
    await expect(attempt).rejects.toThrow("Not enough coins: 30 required, 25 available");
    const view = await new GetSession("session-1", T0 + 3_000).execute(ctx);
    expect(view.mask).toBe("______");
    await expect(ctx.progressionLedger.getProgression("bob")).resolves.toMatchObject({
      coins: 25,
    });
  });

  it("completes the session when it uncovers the last hidden letter", async () => {
    const ctx = withCoins(100);
    await startSession(ctx);
    await new GuessLetter("alice", "k", T0 + 10_000).execute(ctx);
    await new GuessLetter("bob", "i", T0 + 20_000).execute(ctx);
    await new GuessLetter("alice", "t", T0 + 30_000).execute(ctx);
    await new GuessLetter("bob", "e", T0 + 40_000).execute(ctx);

    const result = await new RevealLetter("alice", T0 + 61_000).execute(ctx);

    expect(result).toMatchObject({
      position: 6,
      mask: "kitten",
      remainingBalance: 70,
      session: { status: "completed", word: "kitten" },
    });
    expect(result.rewards?.rewards.map(({ outcome }) => outcome)).toEqual(["draw", "draw"]);
    expect(publishedTypes(ctx.bus).slice(-2)).toEqual(["LetterRevealed", "SessionCompleted"]);
    await expect(ctx.progressionLedger.getProgression("alice")).resolves.toMatchObject({
      coins: 130,
    });
  });

  it("refunds the coins when the session changed underneath", async () => {
    const ctx = withCoins(100);
    await startSession(ctx);
    vi.spyOn(ctx.sessionGateway, "saveSessionState").mockRejectedValueOnce(
      StateConflictError.stale("session-1"),
    );

    await expect(
      new RevealLetter("alice", T0 + 2_000).execute(ctx),
    ).rejects.toMatchObject({ reason: "stale" });

    await expect(ctx.progressionLedger.getProgression("alice")).resolves.toMatchObject({
      coins: 100,
    });
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "Reveal rolled back; coins refunded",
      expect.objectContaining({ playerId: "alice", cost: 30 }),
    );
  });

  it("refunds the coins whatever makes the save fail", async () => {
    const ctx = withCoins(100);
    await startSession(ctx);
    vi.spyOn(ctx.sessionGateway, "saveSessionState").mockRejectedValueOnce(
      new Error("store down"),
    );

    await expect(new RevealLetter("alice", T0 + 2_000).execute(ctx)).rejects.toThrow(
      "store down",
    );

    await expect(ctx.progressionLedger.getProgression("alice")).resolves.toMatchObject({
      coins: 100,
    });
    const view = await new GetSession("session-1", T0 + 3_000).execute(ctx);
    expect(view.mask).toBe("______");
    expect(ctx.bus.publish).not.toHaveBeenCalledWith(
      "session:session-1",
      expect.objectContaining({ type: "LetterRevealed" }),
    );
  });

  it("keeps the charge once the completing save has gone through", async () => {
    const ctx = withCoins(100);
    await startSession(ctx);
    await new GuessLetter("alice", "k", T0 + 10_000).execute(ctx);
    await new GuessLetter("bob", "i", T0 + 20_000).execute(ctx);
    await new GuessLetter("alice", "t", T0 + 30_000).execute(ctx);
    await new GuessLetter("bob", "e", T0 + 40_000).execute(ctx);
    vi.spyOn(ctx.progressionLedger, "addXp").mockRejectedValueOnce(new Error("ledger down"));

    await expect(new RevealLetter("alice", T0 + 61_000).execute(ctx)).rejects.toThrow(
      "ledger down",
    );

    await expect(ctx.sessionGateway.loadSessionState("session-1")).resolves.toMatchObject({
      status: "completed",
      mask: "kitten",
    });
    await expect(ctx.progressionLedger.getProgression("alice")).resolves.toMatchObject({
      coins: 70,
    });
    expect(ctx.logger.warn).not.toHaveBeenCalledWith(
      "Reveal rolled back; coins refunded",
      expect.anything(),
    );
  });
});
