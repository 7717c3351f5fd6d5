import { describe, it, expect } from "vitest";
import { AutoSolver, DIFFICULTIES, Game, playBatch, silentLogger } from "../src/engine/index";
import { expectConfigError, mockLogger } from "./helpers";

describe("playBatch", () => {
  it("plays the requested number of games and sums the outcomes", () => {
    const summary = playBatch({ difficulty: "beginner", games: 4, seed: 7 });
    expect(summary.games).toBe(4);
    expect(summary.seed).toBe(7);
    expect(summary.results).toHaveLength(4);
    expect(summary.won + summary.lost).toBe(4);
    expect(summary.won).toBe(summary.results.filter((r) => r.won).length);
    expect(summary.winRate).toBe(summary.won / 4);
  });

  it("is reproducible from its first seed", () => {
    const first = playBatch({ difficulty: "beginner", games: 3, seed: 100 });
    const second = playBatch({ difficulty: "beginner", games: 3, seed: 100 });
    expect(second).toEqual(first);
  });

  it("gives game i the seed seed + i", () => {
    const summary = playBatch({ difficulty: "beginner", games: 2, seed: 7 });
    const game = new Game({ ...DIFFICULTIES.beginner, seed: 8 }, { logger: silentLogger });
    const alone = new AutoSolver(game, { logger: silentLogger }).solve();
    expect(summary.results[1]).toEqual(alone);
  });

  it("accepts a custom grid", () => {
    const summary = playBatch({ rows: 5, columns: 5, mines: 3, games: 2, seed: 3 });
    expect(summary.results).toHaveLength(2);
    for (const result of summary.results) {
      expect(result.moves[0].strategy).toBe("first-move");
    }
  });

  it("logs the win rate", () => {
    const logger = mockLogger();
    const summary = playBatch({ difficulty: "beginner", games: 2, seed: 1, logger });
    const percent = ((summary.won / 2) * 100).toFixed(2);
    expect(logger.info).toHaveBeenLastCalledWith(`Games won: ${summary.won}/2 (${percent}%)`);
  });

  it("rejects a non-positive or fractional game count", () => {
    expectConfigError(() => playBatch({ difficulty: "beginner", games: 0 }), "INVALID_GAME_COUNT");
    expectConfigError(() => playBatch({ difficulty: "beginner", games: 1.5 }), "INVALID_GAME_COUNT");
  });

  it("reports configuration errors before playing", () => {
    expectConfigError(() => playBatch({ difficulty: "huge", games: 2 }), "UNKNOWN_DIFFICULTY");
  });
});
