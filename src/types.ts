// src/types.ts

export type CellState = "unusable" | "empty" | "occupied";

export interface Board {
  size: number;

  // cells[row][column]
  cells: CellState[][];
}

export interface Coordinate {
  row: number;
  column: number;
}

/**
 * Rotation applied to the row-major scan in findMove.
 * Arbitrary integers; wrapped toroidally by the board size.
 */
export interface ScanOffset {
  row: number;
  column: number;
}

export interface Move {
  from: Coordinate;
  to: Coordinate;
}

export type SimulationPhase = "running" | "halted";

export interface SimulationFrame {
  // 1-based
  moveNumber: number;
  move: Move;
  score: number;

  // Snapshot taken after the move was applied
  board: Board;
}

export interface SimulationResult {
  seed: number;
  boardSize: number;
  score: number;
  moves: readonly Move[];
}
