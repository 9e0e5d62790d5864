import type { Board, CellState } from "../types";
import { validateBoard } from "./validateBoard";

const CELL_SYMBOLS: Readonly<Record<CellState, string>> = {
  unusable: " ",
  empty: ".",
  occupied: "@",
};

function symbolFor(cell: CellState): string {
  switch (cell) {
    case "unusable":
    case "empty":
    case "occupied":
      return CELL_SYMBOLS[cell];
    default: {
      const unknown: never = cell;
      throw new Error(`[serializeBoard] unknown cell state: ${String(unknown)}`);
    }
  }
}

function cellFor(symbol: string, row: number, column: number): CellState {
  switch (symbol) {
    case " ":
      return "unusable";
    case ".":
      return "empty";
    case "@":
      return "occupied";
    default:
      throw new Error(`[deserializeBoard] unknown symbol ${JSON.stringify(symbol)} at (${row}, ${column})`);
  }
}

/** One string per row, one symbol per cell. */
export function serializeBoard(board: Board): string[] {
  return board.cells.map((line) => line.map(symbolFor).join(""));
}

export function deserializeBoard(rows: readonly string[]): Board {
  const board: Board = {
    size: rows.length,
    cells: rows.map((line, row) => Array.from(line, (symbol, column) => cellFor(symbol, row, column))),
  };
  validateBoard(board, "deserializeBoard");
  return board;
}
