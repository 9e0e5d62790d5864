import type { Board } from "../types";
import { isCutout, isValidBoardSize } from "./board";

const VALIDATE = process.env.PEG_VALIDATE_BOARD !== "0";

/**
 * validateBoard (shape-only)
 *
 * Catches structural drift: wrong dimensions, unknown cell values, a playable
 * cell inside a corner cutout or a cutout turned playable. It does not look at
 * whether the position is reachable.
 */
export function validateBoard(board: Board, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(board && typeof board === "object", "board missing", where);
  assert(isValidBoardSize(board.size), `board.size invalid: ${board.size}`, where);
  assert(Array.isArray(board.cells), "board.cells missing", where);
  assert(board.cells.length === board.size, `expected ${board.size} rows, got ${board.cells.length}`, where);

  for (let row = 0; row < board.size; row++) {
    const line = board.cells[row];
    assert(Array.isArray(line), `row ${row} missing`, where);
    assert(line.length === board.size, `row ${row}: expected ${board.size} cells, got ${line.length}`, where);

    for (let column = 0; column < board.size; column++) {
      const cell = line[column];
      assert(
        cell === "unusable" || cell === "empty" || cell === "occupied",
        `cell (${row}, ${column}) invalid: ${String(cell)}`,
        where
      );

      const cutout = isCutout(board.size, row, column);
      assert(
        cutout === (cell === "unusable"),
        cutout
          ? `cell (${row}, ${column}) is a corner cutout but holds ${cell}`
          : `cell (${row}, ${column}) is playable but marked unusable`,
        where
      );
    }
  }
}

export function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[${where}] ${message}`);
}
