// src/engine/simulation.ts
//
// Simulation driver. Each step draws a fresh scan offset (row first, then
// column) from the run's own generator, asks findMove for a jump and plays
// it. The run halts the first time no jump is found.

import type { Board, Move, ScanOffset, SimulationFrame, SimulationPhase, SimulationResult } from "../types";
import { applyMove } from "./applyMove";
import { cloneBoard, createBoard } from "./board";
import { DEFAULT_BOARD_SIZE, initialScore } from "./constants";
import { findMove } from "./findMove";
import { CRand } from "./rng";

export type SimulationOptions = {
  boardSize?: number;
};

export class Simulation {
  readonly seed: number;

  private readonly grid: Board;

  private readonly rng: CRand;
  private readonly history: Move[] = [];
  private currentScore: number;
  private currentPhase: SimulationPhase = "running";

  constructor(seed: number, options: SimulationOptions = {}) {
    const size = options.boardSize ?? DEFAULT_BOARD_SIZE;

    this.seed = seed;
    this.grid = createBoard(size);
    this.rng = new CRand(seed);
    this.currentScore = initialScore(size);
  }

  /** Copy of the current board. */
  get board(): Board {
    return cloneBoard(this.grid);
  }

  get phase(): SimulationPhase {
    return this.currentPhase;
  }

  get score(): number {
    return this.currentScore;
  }

  get moves(): readonly Move[] {
    return this.history;
  }

  /**
   * Play one move. Returns null once the board has no jump left; a halted
   * simulation stays halted and consumes no further draws.
   */
  step(): SimulationFrame | null {
    if (this.currentPhase === "halted") return null;

    const offset: ScanOffset = { row: this.rng.next(), column: this.rng.next() };
    const move = findMove(this.grid, offset);
    if (!move) {
      this.currentPhase = "halted";
      return null;
    }

    applyMove(this.grid, move);
    this.history.push(move);
    this.currentScore--;

    return {
      moveNumber: this.history.length,
      move,
      score: this.currentScore,
      board: cloneBoard(this.grid),
    };
  }

  result(): SimulationResult {
    return {
      seed: this.seed,
      boardSize: this.grid.size,
      score: this.currentScore,
      moves: [...this.history],
    };
  }
}

export type RunSimulationOptions = SimulationOptions & {
  onFrame?: (frame: SimulationFrame) => void;
};

export function runSimulation(seed: number, options: RunSimulationOptions = {}): SimulationResult {
  const sim = new Simulation(seed, options);

  for (let frame = sim.step(); frame; frame = sim.step()) {
    options.onFrame?.(frame);
  }

  return sim.result();
}
