import { Cell, Pos } from "./types";
import { Rng, randomInt } from "./rng";
import { Logger, silentLogger } from "./logger";

export function inBounds(row: number, col: number, rows: number, cols: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < rows &&
    col >= 0 &&
    col < cols
  );
}

export function indexOf(row: number, col: number, cols: number): number {
  return row * cols + col;
}

export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

// Row-major arena; neighbour lists are indices into it.
export function createGrid(rows: number, cols: number): Cell[] {
  const cells: Cell[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      cells.push({
        row: r,
        col: c,
        index: indexOf(r, c, cols),
        neighbours: neighbours(r, c, rows, cols).map((p) => indexOf(p.row, p.col, cols)),
        hasMine: false,
        opened: false,
        flagged: false,
        nearbyMines: 0,
      });
    }
  }
  return cells;
}

/**
 * Place `mines` mines by rejection sampling, keeping the genesis cell and its
 * neighbours clear. Each sample draws a row, then a column. Clue counts are
 * bumped on every neighbour of each mine as it lands, mines included.
 *
 * When the board is too crowded for the whole safe zone, only the genesis
 * cell is kept clear.
 *
 * @returns mine positions in placement order
 */
export function placeMines(
  cells: Cell[],
  rows: number,
  cols: number,
  mines: number,
  genesis: Pos,
  rng: Rng,
  logger: Logger = silentLogger,
): Pos[] {
  const genesisIndex = indexOf(genesis.row, genesis.col, cols);
  let excluded = new Set<number>([genesisIndex, ...cells[genesisIndex].neighbours]);

  if (mines > cells.length - excluded.size) {
    logger.warn(
      `Safe zone around (${genesis.row}, ${genesis.col}) cannot be kept clear with ${mines} mines; ` +
        "only the first cell is protected",
    );
    excluded = new Set<number>([genesisIndex]);
  }
  if (mines > cells.length - excluded.size) {
    throw new RangeError(`Cannot place ${mines} mines on ${cells.length} cells`);
  }

  const placed: Pos[] = [];
  while (placed.length < mines) {
    const row = randomInt(rng, rows);
    const col = randomInt(rng, cols);
    const cell = cells[indexOf(row, col, cols)];
    if (excluded.has(cell.index) || cell.hasMine) continue;

    cell.hasMine = true;
    for (const n of cell.neighbours) cells[n].nearbyMines++;
    placed.push({ row, col });
  }
  return placed;
}

/**
 * Blank-region reveal. Opens `start`, and keeps spreading from every
 * zero-clue cell it opens. Opened and flagged cells stop the spread.
 *
 * @returns indices opened, in visit order
 */
export function openRegion(cells: Cell[], start: number): number[] {
  const opened: number[] = [];
  const stack: number[] = [start];

  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) break;
    const cell = cells[index];
    if (cell.opened || cell.flagged) continue;

    cell.opened = true;
    opened.push(index);
    if (cell.nearbyMines > 0) continue;

    for (const n of cell.neighbours) stack.push(n);
  }

  return opened;
}

// One string per row: `*` for a mine, the clue digit otherwise.
export function describeLayout(
  cells: readonly Readonly<Cell>[],
  rows: number,
  cols: number,
): string[] {
  const lines: string[] = [];
  for (let r = 0; r < rows; r++) {
    let line = "";
    for (let c = 0; c < cols; c++) {
      const cell = cells[indexOf(r, c, cols)];
      line += cell.hasMine ? "*" : String(cell.nearbyMines);
    }
    lines.push(line);
  }
  return lines;
}
