import { ConfigError } from "./errors";
import { randomSeed } from "./rng";
import { Difficulty, GameConfig } from "./types";

export interface GridSize {
  rows: number;
  cols: number;
  mines: number;
}

/** Classic presets */
export const DIFFICULTIES: Record<Difficulty, GridSize> = {
  beginner: { rows: 9, cols: 9, mines: 10 },
  intermediate: { rows: 16, cols: 16, mines: 40 },
  expert: { rows: 16, cols: 30, mines: 99 },
};

export const DEFAULT_CONFIG: Omit<GameConfig, "seed"> = { ...DIFFICULTIES.beginner };

// genesis cell + its 8 neighbours
export const SAFE_ZONE_SIZE = 9;

/**
 * Either a named difficulty or a full custom size, never both.
 */
export interface ConfigOptions {
  difficulty?: string;
  rows?: number;
  columns?: number;
  mines?: number;
  seed?: number;
}

function isDifficulty(name: string): name is Difficulty {
  return Object.prototype.hasOwnProperty.call(DIFFICULTIES, name);
}

export function validateDimensions(rows: number, cols: number, mines: number): void {
  if (!Number.isInteger(rows) || rows <= 0) {
    throw new ConfigError(`Invalid number of rows: ${rows}`, "INVALID_ROWS");
  }
  if (!Number.isInteger(cols) || cols <= 0) {
    throw new ConfigError(`Invalid number of columns: ${cols}`, "INVALID_COLUMNS");
  }
  if (!Number.isInteger(mines) || mines <= 0) {
    throw new ConfigError(`Invalid number of mines: ${mines}`, "INVALID_MINES");
  }
  if (mines >= rows * cols) {
    throw new ConfigError(
      `Number of mines must be less than number of cells (${mines} >= ${rows * cols})`,
      "TOO_MANY_MINES",
    );
  }
}

/** True when a full 3x3 safe zone can always be kept mine-free. */
export function safeZoneFits(rows: number, cols: number, mines: number): boolean {
  return mines <= rows * cols - SAFE_ZONE_SIZE;
}

export function resolveConfig(options: ConfigOptions): GameConfig {
  const { difficulty, rows, columns, mines } = options;
  const custom = rows !== undefined || columns !== undefined || mines !== undefined;
  const seed = options.seed ?? randomSeed();

  if (difficulty !== undefined && custom) {
    throw new ConfigError(
      "Cannot use a difficulty and a custom grid at the same time",
      "CONFLICTING_OPTIONS",
    );
  }

  if (difficulty !== undefined) {
    if (!isDifficulty(difficulty)) {
      throw new ConfigError(
        `Unknown difficulty "${difficulty}" (expected ${Object.keys(DIFFICULTIES).join(", ")})`,
        "UNKNOWN_DIFFICULTY",
      );
    }
    return { ...DIFFICULTIES[difficulty], seed };
  }

  if (rows === undefined || columns === undefined || mines === undefined) {
    const missing = [
      rows === undefined ? "rows" : null,
      columns === undefined ? "columns" : null,
      mines === undefined ? "mines" : null,
    ].filter((name): name is string => name !== null);
    throw new ConfigError(
      custom
        ? `Custom grid is missing: ${missing.join(", ")}`
        : "Either a difficulty or rows, columns and mines are required",
      "MISSING_OPTIONS",
    );
  }

  validateDimensions(rows, columns, mines);
  return { rows, cols: columns, mines, seed };
}
