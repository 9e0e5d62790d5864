// src/ui/presenter.ts
//
// Presenter collaborator: receives board snapshots and the end-of-run summary.
// The engine never prints; playSimulation drives a presenter frame by frame.

import { setTimeout as sleep } from "node:timers/promises";

import type { Board, SimulationFrame, SimulationResult } from "../types";
import { Simulation } from "../engine";
import { formatMove, formatSummary, renderBoard } from "./render";

// Clear screen + cursor home
const CLEAR = "\x1b[2J\x1b[H";

export interface Presenter {
  showBoard(board: Board, frame?: SimulationFrame): void;
  showSummary(result: SimulationResult): void;
}

export type ConsolePresenterOptions = {
  clearScreen?: boolean;
  write?: (text: string) => void;
};

export class ConsolePresenter implements Presenter {
  private readonly clearScreen: boolean;
  private readonly write: (text: string) => void;

  constructor(options: ConsolePresenterOptions = {}) {
    this.clearScreen = options.clearScreen ?? true;
    // eslint-disable-next-line no-console
    this.write = options.write ?? ((text: string) => console.log(text));
  }

  showBoard(board: Board, frame?: SimulationFrame): void {
    const lines = [renderBoard(board)];
    if (frame) lines.push(`#${frame.moveNumber} ${formatMove(frame.move)}  score ${frame.score}`);
    this.write((this.clearScreen ? CLEAR : "") + lines.join("\n"));
  }

  showSummary(result: SimulationResult): void {
    this.write(formatSummary(result));
  }
}

export type PlayOptions = {
  boardSize?: number;
  delayMs?: number;
};

/**
 * Animated single run: initial board, then one frame per move spaced by
 * delayMs, then the summary.
 */
export async function playSimulation(
  seed: number,
  presenter: Presenter,
  options: PlayOptions = {}
): Promise<SimulationResult> {
  const delayMs = options.delayMs ?? 0;
  const sim = new Simulation(seed, { boardSize: options.boardSize });

  presenter.showBoard(sim.board);

  for (let frame = sim.step(); frame; frame = sim.step()) {
    if (delayMs > 0) await sleep(delayMs);
    presenter.showBoard(frame.board, frame);
  }

  const result = sim.result();
  presenter.showSummary(result);
  return result;
}
