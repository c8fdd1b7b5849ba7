import { describe, expect, it } from "vitest";

import { GuessWord } from "../src/domain/commands/GuessWord.js";
import { NotFoundError, ValidationError } from "../src/domain/errors/index.js";
import { T0, createTestContext, publishedTypes, startSession } from "./support/mocks.js";

describe("GuessWord command", () => {
  it("ends the session with a win for a correct guess, out of turn and in any case", async () => {
    const ctx = createTestContext();
    await startSession(ctx);

    const result = await new GuessWord("bob", " KITTEN ", T0 + 121_000).execute(ctx);

    expect(result).toMatchObject({
      success: true,
      message: "Correct! You win the game",
      points: 100,
      session: { status: "completed", mask: "kitten", word: "kitten" },
    });
    expect(result.rewards.rewards).toEqual([
      { playerId: "bob", rank: 0, score: 100, outcome: "win", xp: 180, coins: 60 },
      { playerId: "alice", rank: 1, score: 0, outcome: "lose", xp: 132, coins: 40 },
    ]);
    expect(publishedTypes(ctx.bus).slice(-2)).toEqual(["WordGuessed", "SessionCompleted"]);
  });

  it("ends the session with a loss for a wrong guess and discloses the word", async () => {
    const ctx = createTestContext();
    await startSession(ctx);

    const result = await new GuessWord("alice", "mitten", T0 + 121_000).execute(ctx);

    expect(result).toMatchObject({
      success: false,
      message: "Incorrect guess. You lost the game",
      points: -50,
      session: { status: "completed", mask: "kitten", word: "kitten" },
    });
    expect(result.rewards.rewards).toEqual([
      { playerId: "bob", rank: 0, score: 0, outcome: "win", xp: 156, coins: 60 },
      { playerId: "alice", rank: 1, score: -50, outcome: "lose", xp: 132, coins: 40 },
    ]);
    expect(ctx.bus.publish).toHaveBeenCalledWith("session:session-1", {
      type: "WordGuessed",
      sessionId: "session-1",
      playerId: "alice",
      correct: false,
      points: -50,
      at: T0 + 121_000,
    });
  });

  it("checks the guess length after trimming", async () => {
    const ctx = createTestContext();
    await startSession(ctx);

    await expect(
      new GuessWord("alice", "  ab  ", T0 + 2_000).execute(ctx),
    ).rejects.toThrow("Word must be between 3 and 100 characters");
    expect(() => new GuessWord("alice", "   ", T0)).toThrow(ValidationError);
  });

  it("leaves nothing to guess once the session is over", async () => {
    const ctx = createTestContext();
    await startSession(ctx);
    await new GuessWord("bob", "kitten", T0 + 2_000).execute(ctx);

    await expect(
      new GuessWord("alice", "kitten", T0 + 3_000).execute(ctx),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
