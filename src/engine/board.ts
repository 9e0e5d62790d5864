// src/engine/board.ts
//
// Cross-shaped board: a square of odd side with an L of three unusable
// cells cut from each corner. The centre starts empty, every other playable
// cell starts occupied.

import type { Board, CellState } from "../types";
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "./constants";

export function isValidBoardSize(size: number): boolean {
  return Number.isInteger(size) && size >= MIN_BOARD_SIZE && size <= MAX_BOARD_SIZE && size % 2 === 1;
}

/**
 * True for the twelve corner cells outside the cross.
 */
export function isCutout(size: number, row: number, column: number): boolean {
  const rowFromEdge = Math.min(row, size - 1 - row);
  const columnFromEdge = Math.min(column, size - 1 - column);
  return rowFromEdge + columnFromEdge <= 1;
}

export function createBoard(size: number): Board {
  if (!isValidBoardSize(size)) {
    throw new Error(
      `createBoard: board size must be an odd integer in [${MIN_BOARD_SIZE}, ${MAX_BOARD_SIZE}], got ${size}`
    );
  }

  const cells: CellState[][] = [];
  for (let row = 0; row < size; row++) {
    const line: CellState[] = [];
    for (let column = 0; column < size; column++) {
      line.push(isCutout(size, row, column) ? "unusable" : "occupied");
    }
    cells.push(line);
  }

  const center = (size - 1) / 2;
  cells[center][center] = "empty";

  return { size, cells };
}

/**
 * Total lookup: out-of-bounds coordinates yield undefined, never an error.
 * The move finder leans on this at the board edges.
 */
export function readCell(board: Board, row: number, column: number): CellState | undefined {
  if (row < 0 || column < 0 || row >= board.size || column >= board.size) {
    return undefined;
  }
  return board.cells[row][column];
}

export function cloneBoard(board: Board): Board {
  return { size: board.size, cells: board.cells.map((line) => [...line]) };
}
