import type { Board, CellState, Move, SimulationFrame, SimulationResult } from "../src/types";
import { deserializeBoard } from "../src/engine";
import type { Presenter } from "../src/ui/presenter";

/**
 * Board from a diagram: " " unusable, "." empty, "@" occupied.
 * Rows are validated, so the corner cutouts must be spaces.
 */
export function boardFrom(...rows: string[]): Board {
  return deserializeBoard(rows);
}

export function countCells(board: Board, state: CellState): number {
  return board.cells.flat().filter((c) => c === state).length;
}

// (fromRow, fromColumn, toRow, toColumn)
export function mv(fr: number, fc: number, tr: number, tc: number): Move {
  return { from: { row: fr, column: fc }, to: { row: tr, column: tc } };
}

export class RecordingPresenter implements Presenter {
  readonly boards: Board[] = [];
  readonly frames: SimulationFrame[] = [];
  readonly summaries: SimulationResult[] = [];

  showBoard(board: Board, frame?: SimulationFrame): void {
    this.boards.push(board);
    if (frame) this.frames.push(frame);
  }

  showSummary(result: SimulationResult): void {
    this.summaries.push(result);
  }
}
