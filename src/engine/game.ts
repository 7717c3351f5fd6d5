import {
  Cell,
  CellView,
  GameConfig,
  GameEventMap,
  GameListener,
  GameStatus,
  Pos,
} from "./types";
import {
  createGrid,
  describeLayout,
  inBounds,
  indexOf,
  openRegion,
  placeMines,
} from "./board";
import {
  DEFAULT_CONFIG,
  ConfigOptions,
  resolveConfig,
  safeZoneFits,
  validateDimensions,
} from "./config";
import { Rng, createRng, randomSeed } from "./rng";
import { Logger, createLogger } from "./logger";

export interface GameRuntime {
  /** Overrides the generator seeded from `config.seed`. */
  rng?: Rng;
  logger?: Logger;
}

type ListenerSets = { [K in keyof GameEventMap]: Set<GameListener<K>> };

export class Game {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  readonly mines: number;
  readonly seed: number;
  protected readonly arena: Cell[];
  private statusValue: GameStatus = GameStatus.Playing;
  private explodedPos: Pos | null = null;
  private firstMove = true;
  private readonly rng: Rng;
  private readonly logger: Logger;
  private readonly listeners: ListenerSets = {
    cellChanged: new Set(),
    gameFinished: new Set(),
  };
  // Cells touched by the running operation, flushed to listeners at its end
  private readonly changed = new Set<number>();
  private finishPending = false;

  constructor(config: Partial<GameConfig> = {}, runtime: GameRuntime = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      seed: config.seed ?? randomSeed(),
    };
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.mines = this.config.mines;
    this.seed = this.config.seed;
    validateDimensions(this.rows, this.cols, this.mines);

    this.rng = runtime.rng ?? createRng(this.seed);
    this.logger = runtime.logger ?? createLogger("Minesweeper");
    this.arena = createGrid(this.rows, this.cols);

    if (!safeZoneFits(this.rows, this.cols, this.mines)) {
      this.logger.warn(
        `${this.mines} mines on a ${this.rows}x${this.cols} grid may not leave room for a mine-free first move area`,
      );
    }
    this.logger.debug(
      `Game grid: ${this.rows}x${this.cols} with ${this.mines} mines (seed ${this.seed})`,
    );
  }

  get status(): GameStatus {
    return this.statusValue;
  }

  get finished(): boolean {
    return this.statusValue !== GameStatus.Playing;
  }

  get won(): boolean {
    return this.statusValue === GameStatus.Won;
  }

  /** False until the first reveal has placed the mines. */
  get started(): boolean {
    return !this.firstMove;
  }

  get exploded(): Pos | null {
    return this.explodedPos;
  }

  /** Row-major cells. Change them through `reveal`, `toggleFlag` and `chord`. */
  get cells(): readonly Readonly<Cell>[] {
    return this.arena;
  }

  get cellCount(): number {
    return this.arena.length;
  }

  get remainingMines(): number {
    let flags = 0;
    for (const c of this.arena) if (c.flagged) flags++;
    return this.mines - flags;
  }

  on<K extends keyof GameEventMap>(event: K, listener: GameListener<K>): () => void {
    const set = this.listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  cell(row: number, col: number): Readonly<Cell> {
    if (!inBounds(row, col, this.rows, this.cols)) {
      throw new RangeError(`Cell (${row}, ${col}) is outside a ${this.rows}x${this.cols} grid`);
    }
    return this.arena[indexOf(row, col, this.cols)];
  }

  neighboursOf(index: number): readonly number[] {
    return this.arena[index].neighbours;
  }

  cellView(row: number, col: number): CellView {
    return this.viewAt(this.cell(row, col).index);
  }

  viewAt(index: number): CellView {
    const c = this.arena[index];
    const lost = this.statusValue === GameStatus.Lost;
    const exploded =
      this.explodedPos !== null &&
      this.explodedPos.row === c.row &&
      this.explodedPos.col === c.col;

    return {
      row: c.row,
      col: c.col,
      opened: c.opened,
      flagged: c.flagged,
      nearbyMines: c.opened ? c.nearbyMines : null,
      hasMine: c.opened || this.finished ? c.hasMine : null,
      exploded,
      wrongFlag: lost && c.flagged && !c.hasMine,
    };
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        row.push(this.viewAt(indexOf(r, c, this.cols)));
      }
      out.push(row);
    }
    return out;
  }

  /**
   * Open a cell. The first call places the mines around it.
   *
   * @returns positions opened by this move (not the end-of-game reveal)
   */
  reveal(row: number, col: number): Pos[] {
    if (this.finished) return [];
    if (!inBounds(row, col, this.rows, this.cols)) return [];

    this.ensureMines(row, col);

    const cell = this.arena[indexOf(row, col, this.cols)];
    if (cell.opened || cell.flagged) {
      this.logger.debug(`reveal (${row}, ${col}): already opened or flagged`);
      return [];
    }

    const opened = this.openCell(cell);
    this.settle();
    return opened.map((i) => this.posOf(i));
  }

  toggleFlag(row: number, col: number): void {
    if (this.finished) return;
    if (!inBounds(row, col, this.rows, this.cols)) return;
    if (this.firstMove) {
      this.logger.debug(`toggleFlag (${row}, ${col}): no mines yet, reveal a cell first`);
      return;
    }

    const cell = this.arena[indexOf(row, col, this.cols)];
    if (cell.opened) return;

    cell.flagged = !cell.flagged;
    this.changed.add(cell.index);
    this.logger.debug(`toggleFlag (${row}, ${col}): ${cell.flagged ? "flagged" : "unflagged"}`);
    this.settle();
  }

  // Open unflagged neighbours if the flag count matches the clue
  chord(row: number, col: number): Pos[] {
    if (this.finished) return [];
    if (!inBounds(row, col, this.rows, this.cols)) return [];
    const cell = this.arena[indexOf(row, col, this.cols)];
    if (!cell.opened || cell.flagged || cell.nearbyMines === 0) return [];

    let flags = 0;
    for (const n of cell.neighbours) {
      if (this.arena[n].flagged) flags++;
    }
    if (flags !== cell.nearbyMines) return [];

    const opened: number[] = [];
    for (const n of cell.neighbours) {
      const nc = this.arena[n];
      if (nc.opened || nc.flagged) continue;
      opened.push(...this.openCell(nc));
      // A mine ends the chord on the spot
      if (this.finished) break;
    }

    this.settle();
    return opened.map((i) => this.posOf(i));
  }

  /**
   * All mine-free cells opened, or all mines flagged. Reads cell state only.
   */
  checkWin(): boolean {
    if (this.firstMove) return false;
    let allSafeOpened = true;
    let allMinesFlagged = true;
    for (const c of this.arena) {
      if (c.hasMine) {
        if (!c.flagged) allMinesFlagged = false;
      } else if (!c.opened) {
        allSafeOpened = false;
      }
      if (!allSafeOpened && !allMinesFlagged) return false;
    }
    return true;
  }

  // Lazily called on the first reveal
  private ensureMines(row: number, col: number): void {
    if (!this.firstMove) return;
    this.firstMove = false;

    const placed = placeMines(
      this.arena,
      this.rows,
      this.cols,
      this.mines,
      { row, col },
      this.rng,
      this.logger,
    );
    this.logger.debug(`First move at (${row}, ${col}), placed ${placed.length} mines`);
    for (const line of describeLayout(this.arena, this.rows, this.cols)) {
      this.logger.debug(line);
    }
  }

  private openCell(cell: Cell): number[] {
    if (cell.hasMine) {
      cell.opened = true;
      this.changed.add(cell.index);
      this.lose(cell);
      return [cell.index];
    }

    if (cell.nearbyMines === 0) {
      const region = openRegion(this.arena, cell.index);
      for (const i of region) this.changed.add(i);
      return region;
    }

    cell.opened = true;
    this.changed.add(cell.index);
    return [cell.index];
  }

  private lose(cell: Cell): void {
    this.statusValue = GameStatus.Lost;
    this.explodedPos = { row: cell.row, col: cell.col };
    this.logger.debug(`reveal (${cell.row}, ${cell.col}): hit a mine`);
    this.revealAll();
    this.finishPending = true;
  }

  // Display reveal at game end; flags stay in place
  private revealAll(): void {
    for (const c of this.arena) {
      if (c.opened) continue;
      if (!c.flagged) c.opened = true;
      this.changed.add(c.index);
    }
  }

  // End of every mutating operation: win check, then notifications
  private settle(): void {
    if (!this.finished && this.checkWin()) {
      this.statusValue = GameStatus.Won;
      this.revealAll();
      this.finishPending = true;
    }

    const changed = [...this.changed];
    this.changed.clear();
    for (const i of changed) {
      const c = this.arena[i];
      const view = this.viewAt(i);
      for (const listener of this.listeners.cellChanged) {
        listener({ row: c.row, col: c.col, view });
      }
    }

    if (this.finishPending) {
      this.finishPending = false;
      this.logger.debug(this.won ? "Game won" : "Game lost");
      const event = { won: this.won, exploded: this.explodedPos };
      for (const listener of this.listeners.gameFinished) listener(event);
    }
  }

  private posOf(index: number): Pos {
    const c = this.arena[index];
    return { row: c.row, col: c.col };
  }
}

export function newGame(
  rows: number,
  columns: number,
  mines: number,
  seed?: number,
  runtime: GameRuntime = {},
): Game {
  return new Game({ rows, cols: columns, mines, seed }, runtime);
}

/** Build a game from a difficulty name or a custom size. */
export function createGame(options: ConfigOptions, runtime: GameRuntime = {}): Game {
  return new Game(resolveConfig(options), runtime);
}
