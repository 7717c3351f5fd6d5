export type Difficulty = "beginner" | "intermediate" | "expert";

export interface GameConfig {
  rows: number;
  cols: number;
  mines: number;
  seed: number;
}

export interface Cell {
  readonly row: number;
  readonly col: number;
  readonly index: number;       // row-major position in the arena
  readonly neighbours: readonly number[]; // arena indices, up to 8
  hasMine: boolean;
  opened: boolean;
  flagged: boolean;
  nearbyMines: number;          // 0..8, written once at placement
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

// Read-only cell snapshot for renderers and the solver
export interface CellView {
  row: number;
  col: number;
  opened: boolean;
  flagged: boolean;
  nearbyMines: number | null; // visible once opened
  hasMine: boolean | null;    // visible once opened or game over
  exploded: boolean;          // the mine that ended the game
  wrongFlag: boolean;         // flag on a safe cell, shown on game-over
}

export interface Pos {
  row: number;
  col: number;
}

export interface CellChangedEvent {
  row: number;
  col: number;
  view: CellView;
}

export interface GameFinishedEvent {
  won: boolean;
  exploded: Pos | null;
}

export interface GameEventMap {
  cellChanged: CellChangedEvent;
  gameFinished: GameFinishedEvent;
}

export type GameListener<K extends keyof GameEventMap> = (event: GameEventMap[K]) => void;
