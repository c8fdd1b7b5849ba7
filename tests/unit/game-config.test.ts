import { describe, expect, it } from "vitest";

import { ValidationError } from "../../src/domain/errors/index.js";
import { createGameConfig } from "../../src/domain/GameConfig.js";

describe("createGameConfig", () => {
  it("fills in the defaults", () => {
    const config = createGameConfig();

    expect(config.playersToStart).toBe(2);
    expect(config.durationsMs).toEqual({ easy: 600_000, medium: 420_000, hard: 300_000 });
    expect(config.revealCost).toBe(30);
    expect(config.turnAssignment).toBe("first-joiner");
    expect(config.letterReveal).toBe("all-occurrences");
    expect(config.repeatedGuess).toBe("reject");
    expect(config.cache).toEqual({
      pointerTtlMs: 600_000,
      snapshotTtlMs: 900_000,
      missTtlMs: 60_000,
    });
  });

  it("merges nested overrides with the defaults", () => {
    const config = createGameConfig({
      durationsMs: { hard: 120_000 },
      rewards: { completionXp: 40 },
    });

    expect(config.durationsMs).toEqual({ easy: 600_000, medium: 420_000, hard: 120_000 });
    expect(config.rewards.completionXp).toBe(40);
    expect(config.rewards.rankXp).toEqual([50, 30]);
  });

  it("reports every invalid setting at once", () => {
    let caught: unknown;
    try {
      createGameConfig({ playersToStart: 1, revealCost: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      issues: [
        "playersToStart must be an integer greater than or equal to 2",
        "revealCost must be a positive integer",
      ],
    });
  });
});
