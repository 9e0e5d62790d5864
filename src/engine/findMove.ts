// src/engine/findMove.ts
//
// Rotated scan: walk the grid row-major, but shift every visited index by
// the offset (mod size). The first occupied cell with a legal jump, checked in
// DIRECTIONS order, wins. Seed variation enters only through the offset.

import type { Board, Move, ScanOffset } from "../types";
import { readCell } from "./board";
import { DIRECTIONS, normalizeIndex } from "./constants";
import { assert } from "./validateBoard";

export function findMove(board: Board, offset: ScanOffset): Move | null {
  assert(
    Number.isInteger(offset.row) && Number.isInteger(offset.column),
    `offset must be integral, got (${offset.row}, ${offset.column})`,
    "findMove"
  );

  const { size } = board;
  const rowShift = normalizeIndex(offset.row, size);
  const columnShift = normalizeIndex(offset.column, size);

  for (let row = 0; row < size; row++) {
    for (let column = 0; column < size; column++) {
      const r = (row + rowShift) % size;
      const c = (column + columnShift) % size;

      const cell = readCell(board, r, c);
      assert(cell !== undefined, `rotated cell (${r}, ${c}) out of bounds`, "findMove");
      if (cell !== "occupied") continue;

      for (const [dr, dc] of DIRECTIONS) {
        if (readCell(board, r + dr, c + dc) !== "occupied") continue;

        const toRow = r + 2 * dr;
        const toColumn = c + 2 * dc;
        if (readCell(board, toRow, toColumn) !== "empty") continue;

        return { from: { row: r, column: c }, to: { row: toRow, column: toColumn } };
      }
    }
  }

  return null;
}

/**
 * Every legal jump on the board, in plain row-major order.
 */
export function listMoves(board: Board): Move[] {
  const moves: Move[] = [];
  for (let r = 0; r < board.size; r++) {
    for (let c = 0; c < board.size; c++) {
      if (readCell(board, r, c) !== "occupied") continue;
      for (const [dr, dc] of DIRECTIONS) {
        if (readCell(board, r + dr, c + dc) !== "occupied") continue;
        if (readCell(board, r + 2 * dr, c + 2 * dc) !== "empty") continue;
        moves.push({ from: { row: r, column: c }, to: { row: r + 2 * dr, column: c + 2 * dc } });
      }
    }
  }
  return moves;
}
