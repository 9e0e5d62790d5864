// src/engine/applyMove.ts
//
// Executes a jump in place. The finder never proposes an illegal move, so any
// failed precondition here means a broken invariant and throws before the
// board is touched.

import type { Board, Coordinate, Move } from "../types";
import { readCell } from "./board";
import { assert, validateBoard } from "./validateBoard";

function describe(at: Coordinate): string {
  return `(${at.row}, ${at.column})`;
}

export function midpoint(move: Move): Coordinate {
  return {
    row: (move.from.row + move.to.row) / 2,
    column: (move.from.column + move.to.column) / 2,
  };
}

export function applyMove(board: Board, move: Move): void {
  const { from, to } = move;
  const dRow = Math.abs(to.row - from.row);
  const dColumn = Math.abs(to.column - from.column);

  assert(
    (dRow === 2 && dColumn === 0) || (dRow === 0 && dColumn === 2),
    `${describe(from)} ~> ${describe(to)} is not an orthogonal jump of two cells`,
    "applyMove"
  );

  const over = midpoint(move);

  assert(readCell(board, from.row, from.column) === "occupied", `origin ${describe(from)} not occupied`, "applyMove");
  assert(readCell(board, to.row, to.column) === "empty", `destination ${describe(to)} not empty`, "applyMove");
  assert(readCell(board, over.row, over.column) === "occupied", `jumped cell ${describe(over)} not occupied`, "applyMove");

  board.cells[from.row][from.column] = "empty";
  board.cells[over.row][over.column] = "empty";
  board.cells[to.row][to.column] = "occupied";

  validateBoard(board, "applyMove");
}
