import { ConfigOptions, resolveConfig } from "./config";
import { ConfigError } from "./errors";
import { Game } from "./game";
import { Logger, silentLogger } from "./logger";
import { AutoSolver, SolverResult } from "./solver";

export interface BatchOptions extends ConfigOptions {
  games: number;
  logger?: Logger;
}

export interface BatchSummary {
  games: number;
  won: number;
  lost: number;
  winRate: number; // 0..1
  seed: number;
  results: SolverResult[];
}

/**
 * Let the solver play `games` independent games. Game `i` uses seed
 * `seed + i`, so a batch is reproducible from its first seed.
 */
export function playBatch(options: BatchOptions): BatchSummary {
  const { games } = options;
  if (!Number.isInteger(games) || games <= 0) {
    throw new ConfigError(`Invalid number of games: ${games}`, "INVALID_GAME_COUNT");
  }

  const base = resolveConfig(options);
  const logger = options.logger ?? silentLogger;
  const results: SolverResult[] = [];
  let won = 0;

  for (let i = 0; i < games; i++) {
    const seed = (base.seed + i) >>> 0;
    const game = new Game({ ...base, seed }, { logger });
    const result = new AutoSolver(game, { logger }).solve();
    if (result.won) won++;
    results.push(result);
  }

  const winRate = won / games;
  logger.info(`Games won: ${won}/${games} (${(winRate * 100).toFixed(2)}%)`);
  return { games, won, lost: games - won, winRate, seed: base.seed, results };
}
