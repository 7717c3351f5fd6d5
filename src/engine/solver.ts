import { Game } from "./game";
import { Pos } from "./types";
import {
  Rng,
  createRng,
  deriveSeed,
  pickRandom,
  randomInt,
} from "./rng";
import { Logger, createLogger } from "./logger";

export enum SolverState {
  NotStarted = "not-started",
  Running = "running",
  Won = "won",
  Lost = "lost",
}

export type SolverStrategy = "first-move" | "flag-pass" | "open-pass" | "subset" | "random";

export interface SolverMove extends Pos {
  kind: "reveal" | "flag";
  strategy: SolverStrategy;
}

export interface SolverResult {
  won: boolean;
  moves: SolverMove[];
  guesses: number;      // random reveals after the first move
  subsetRounds: number;
}

export interface SolverOptions {
  /** Defaults to a generator derived from the game's seed. */
  rng?: Rng;
  logger?: Logger;
}

interface Constraint {
  remaining: number;        // clue minus flagged neighbours
  unresolved: Set<number>;  // neighbours neither opened nor flagged
}

/**
 * Plays a game through the same calls a person would make.
 *
 * Two local rules run until they stop making progress:
 *   1. clue == closed neighbours  -> every closed neighbour is a mine
 *   2. clue == flagged neighbours -> every other closed neighbour is safe
 * On a stall, pairs of clues are compared (subset difference). If that
 * finds nothing either, a random closed cell is revealed.
 *
 * The board is read through `CellView` only, so hidden cells give nothing
 * away. Moves are never taken back; a random reveal can lose the game.
 */
export class AutoSolver {
  private stateValue = SolverState.NotStarted;
  private readonly moves: SolverMove[] = [];
  private guesses = 0;
  private subsetRounds = 0;
  private readonly rng: Rng;
  private readonly logger: Logger;

  constructor(private readonly game: Game, options: SolverOptions = {}) {
    this.rng = options.rng ?? createRng(deriveSeed(game.seed));
    this.logger = options.logger ?? createLogger("AutoSolver");
  }

  get state(): SolverState {
    return this.stateValue;
  }

  solve(): SolverResult {
    if (this.stateValue !== SolverState.NotStarted) {
      throw new Error(`AutoSolver.solve() was already called (state: ${this.stateValue})`);
    }
    this.stateValue = SolverState.Running;

    if (!this.game.started) this.firstMove();

    let resolved = this.resolvedCount();
    while (!this.game.finished) {
      this.flagPass();
      this.openPass();
      if (this.game.finished) break;

      if (resolved === this.resolvedCount()) {
        this.logger.warn("Game is stuck, trying the subset strategy");
        if (!this.subsetPass()) {
          this.logger.warn("Game is stuck, random move");
          this.randomMove();
        }
      }
      resolved = this.resolvedCount();
    }

    this.stateValue = this.game.won ? SolverState.Won : SolverState.Lost;
    this.logger.info(this.game.won ? "Game won!" : "Game lost!");
    return this.result();
  }

  result(): SolverResult {
    return {
      won: this.game.won,
      moves: [...this.moves],
      guesses: this.guesses,
      subsetRounds: this.subsetRounds,
    };
  }

  // No clues exist yet, so any cell will do
  firstMove(): void {
    this.reveal(randomInt(this.rng, this.game.cellCount), "first-move");
  }

  /**
   * Flag the closed neighbours of every clue that equals its closed count.
   *
   * @returns number of flags placed
   */
  flagPass(): number {
    let placed = 0;
    for (let i = 0; i < this.game.cellCount; i++) {
      if (this.game.finished) break;
      const view = this.game.viewAt(i);
      if (!view.opened || view.flagged || view.hasMine || view.nearbyMines === null) continue;

      const closed = this.game.neighboursOf(i).filter((n) => !this.game.viewAt(n).opened);
      if (view.nearbyMines !== closed.length) continue;

      for (const n of closed) {
        if (this.game.finished) break;
        if (this.game.viewAt(n).flagged) continue;
        this.flag(n, "flag-pass");
        placed++;
      }
    }
    return placed;
  }

  /**
   * Reveal the closed neighbours of every clue already satisfied by flags.
   *
   * @returns number of reveals issued
   */
  openPass(): number {
    let issued = 0;
    for (let i = 0; i < this.game.cellCount; i++) {
      if (this.game.finished) break;
      const view = this.game.viewAt(i);
      if (!view.opened || view.flagged || view.nearbyMines === null) continue;

      const around = this.game.neighboursOf(i);
      const flags = around.filter((n) => this.game.viewAt(n).flagged).length;
      if (view.nearbyMines !== flags) continue;

      for (const n of around) {
        if (this.game.finished) break;
        const nv = this.game.viewAt(n);
        if (nv.opened || nv.flagged) continue;
        this.reveal(n, "open-pass");
        issued++;
      }
    }
    return issued;
  }

  /**
   * Compare every pair of clues A, B with remaining counts rA >= rB. When
   * rA - rB equals the number of A's unresolved cells that B cannot see,
   * those cells are all mines and B's private cells are all safe.
   *
   * @returns true if the board changed
   */
  subsetPass(): boolean {
    this.subsetRounds++;
    const before = this.resolvedCount();

    const clues: number[] = [];
    for (let i = 0; i < this.game.cellCount; i++) {
      const view = this.game.viewAt(i);
      if (view.opened && !view.flagged && !view.hasMine && (view.nearbyMines ?? 0) > 0) {
        clues.push(i);
      }
    }

    const cache = new Map<number, Constraint>();
    const constraintOf = (index: number): Constraint => {
      const hit = cache.get(index);
      if (hit) return hit;
      const built = this.constraint(index);
      cache.set(index, built);
      return built;
    };

    for (let x = 0; x < clues.length && !this.game.finished; x++) {
      for (let y = x + 1; y < clues.length && !this.game.finished; y++) {
        const a = constraintOf(clues[x]);
        const b = constraintOf(clues[y]);
        if (a.remaining <= 0 || b.remaining <= 0) continue;
        if (sameSet(a.unresolved, b.unresolved)) continue;

        const applied =
          a.remaining >= b.remaining
            ? this.applyDifference(a, b) || (a.remaining === b.remaining && this.applyDifference(b, a))
            : this.applyDifference(b, a);
        if (applied) cache.clear();
      }
    }

    return this.game.finished || this.resolvedCount() !== before;
  }

  randomMove(): void {
    const closed: number[] = [];
    for (let i = 0; i < this.game.cellCount; i++) {
      const view = this.game.viewAt(i);
      if (!view.opened && !view.flagged) closed.push(i);
    }
    this.guesses++;
    this.reveal(pickRandom(this.rng, closed), "random");
  }

  private applyDifference(hi: Constraint, lo: Constraint): boolean {
    const onlyHi = [...hi.unresolved].filter((n) => !lo.unresolved.has(n));
    if (hi.remaining - lo.remaining !== onlyHi.length) return false;
    const onlyLo = [...lo.unresolved].filter((n) => !hi.unresolved.has(n));
    if (onlyHi.length === 0 && onlyLo.length === 0) return false;

    for (const n of onlyHi) {
      if (this.game.finished) break;
      this.flag(n, "subset");
    }
    for (const n of onlyLo) {
      if (this.game.finished) break;
      // an earlier reveal may have flooded over it
      if (this.game.viewAt(n).opened) continue;
      this.reveal(n, "subset");
    }
    return true;
  }

  private constraint(index: number): Constraint {
    const view = this.game.viewAt(index);
    let flags = 0;
    const unresolved = new Set<number>();
    for (const n of this.game.neighboursOf(index)) {
      const nv = this.game.viewAt(n);
      if (nv.flagged) flags++;
      else if (!nv.opened) unresolved.add(n);
    }
    return { remaining: (view.nearbyMines ?? 0) - flags, unresolved };
  }

  private resolvedCount(): number {
    let count = 0;
    for (let i = 0; i < this.game.cellCount; i++) {
      const view = this.game.viewAt(i);
      if (view.opened || view.flagged) count++;
    }
    return count;
  }

  private reveal(index: number, strategy: SolverStrategy): void {
    const { row, col } = this.game.viewAt(index);
    this.logger.debug(`${strategy}: reveal (${row}, ${col})`);
    this.moves.push({ kind: "reveal", row, col, strategy });
    this.game.reveal(row, col);
  }

  private flag(index: number, strategy: SolverStrategy): void {
    const { row, col } = this.game.viewAt(index);
    this.logger.debug(`${strategy}: flag (${row}, ${col})`);
    this.moves.push({ kind: "flag", row, col, strategy });
    this.game.toggleFlag(row, col);
  }
}

function sameSet(a: Set<number>, b: Set<number>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}
