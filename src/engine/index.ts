export { Game, newGame, createGame } from "./game";
export type { GameRuntime } from "./game";
export {
  createGrid,
  placeMines,
  openRegion,
  describeLayout,
  neighbours,
  indexOf,
  inBounds,
} from "./board";
export { createRng, randomInt, pickRandom, deriveSeed, randomSeed } from "./rng";
export type { Rng } from "./rng";
export {
  DIFFICULTIES,
  DEFAULT_CONFIG,
  SAFE_ZONE_SIZE,
  resolveConfig,
  validateDimensions,
  safeZoneFits,
} from "./config";
export type { ConfigOptions, GridSize } from "./config";
export { ConfigError } from "./errors";
export type { ConfigErrorCode } from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export type {
  Cell,
  CellView,
  Difficulty,
  GameConfig,
  GameEventMap,
  GameListener,
  CellChangedEvent,
  GameFinishedEvent,
  Pos,
} from "./types";
export { GameStatus } from "./types";
export { AutoSolver, SolverState } from "./solver";
export type { SolverMove, SolverOptions, SolverResult, SolverStrategy } from "./solver";
export { playBatch } from "./batch";
export type { BatchOptions, BatchSummary } from "./batch";
