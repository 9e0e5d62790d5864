// src/ui/render.ts
//
// Text forms handed to presenters. Board symbols: " " unusable, "." empty,
// "@" occupied.

import type { Board, Move, SimulationResult } from "../types";
import { serializeBoard } from "../engine";

export const MOVE_SEPARATOR = " ; ";

export function renderBoard(board: Board): string {
  return serializeBoard(board).join("\n");
}

export function formatMove(move: Move): string {
  const { from, to } = move;
  return `(${from.row}, ${from.column}) ~> (${to.row}, ${to.column})`;
}

export function formatSummary(result: SimulationResult): string {
  return (
    `Using seed ${result.seed}.\n` +
    `Ended with ${result.score} matches remaining. Took ${result.moves.length} moves:\n` +
    result.moves.map(formatMove).join(MOVE_SEPARATOR)
  );
}

export function formatBatchReport(runs: number, bestScore: number, bestSeed: number): string {
  return `best score in ${runs} runs is ${bestScore} for seed ${bestSeed}`;
}

export function formatWinningSeed(seed: number): string {
  return `* * * winning seed is: ${seed}`;
}
