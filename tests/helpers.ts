import { vi } from "vitest";
import {
  Cell,
  ConfigError,
  ConfigErrorCode,
  Game,
  Logger,
  Rng,
  indexOf,
  silentLogger,
} from "../src/engine/index";

// Replays `values` in a loop
export function sequenceRng(values: number[]): Rng {
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}

export function mockLogger(): Logger & Record<keyof Logger, ReturnType<typeof vi.fn>> {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function expectConfigError(fn: () => unknown, code: ConfigErrorCode): ConfigError {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  if (!(caught instanceof ConfigError)) {
    throw new Error(`expected a ConfigError with code ${code}`);
  }
  if (caught.code !== code) {
    throw new Error(`expected code ${code}, got ${caught.code}`);
  }
  return caught;
}

/** Game with write access to its cells, for states no move sequence reaches. */
export class FixtureGame extends Game {
  editCell(row: number, col: number): Cell {
    this.cell(row, col);
    return this.arena[indexOf(row, col, this.cols)];
  }
}

/**
 * 4x4, mines at (3,0) and (3,3), first move at (0,3):
 *
 *   0000
 *   0000
 *   1111
 *   *11*
 *
 * After the first move rows 0-2 are open and row 3 is closed.
 */
export function twoMineGame(): FixtureGame {
  const game = new FixtureGame(
    { rows: 4, cols: 4, mines: 2, seed: 1 },
    { rng: sequenceRng([0.9, 0.9, 0.9, 0]), logger: silentLogger },
  );
  game.reveal(0, 3);
  return game;
}
