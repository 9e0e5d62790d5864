import type { Board } from "../types";

/** Number of pegs left on the board. */
export function scoreBoard(board: Board): number {
  let score = 0;
  for (const line of board.cells) {
    for (const cell of line) {
      if (cell === "occupied") score++;
    }
  }
  return score;
}
