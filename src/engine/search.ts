// src/engine/search.ts
//
// Best-seed search: sequential runs with seeds drawn from a batch generator,
// reporting the best score of every batch, until a run leaves a single peg.

import { DEFAULT_BOARD_SIZE } from "./constants";
import { CRand, randomSeed } from "./rng";
import { runSimulation } from "./simulation";

export const DEFAULT_SEARCH_BATCH_SIZE = 100_000;

export const WINNING_SCORE = 1;

export type BatchReport = {
  // 1-based
  batch: number;
  runs: number;
  bestScore: number;
  bestSeed: number;
};

export type SearchOptions = {
  boardSize?: number;
  batchSize?: number;

  /** Seeds the generator that hands out run seeds; called once per batch. */
  nextBatchSeed?: () => number;

  /** Final score for a seed. Defaults to a full simulation. */
  runSeed?: (seed: number) => number;

  /** Stop after this many runs. Unbounded when omitted. */
  maxRuns?: number;

  onBatch?: (report: BatchReport) => void;
};

export type SearchResult =
  | { found: true; seed: number; runs: number }
  | { found: false; runs: number; best: { score: number; seed: number } | null };

export function searchBestSeed(options: SearchOptions = {}): SearchResult {
  const boardSize = options.boardSize ?? DEFAULT_BOARD_SIZE;
  const batchSize = options.batchSize ?? DEFAULT_SEARCH_BATCH_SIZE;
  const nextBatchSeed = options.nextBatchSeed ?? (() => randomSeed());
  const runSeed = options.runSeed ?? ((seed: number) => runSimulation(seed, { boardSize }).score);
  const maxRuns = options.maxRuns ?? Infinity;

  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`searchBestSeed: batchSize must be a positive integer, got ${batchSize}`);
  }

  const seeds = new CRand(nextBatchSeed());
  let batch = 1;
  let inBatch = 0;
  let bestScore = Infinity;
  let bestSeed = 0;
  let overall: { score: number; seed: number } | null = null;
  let runs = 0;

  while (runs < maxRuns) {
    runs++;
    let seed = seeds.next();
    // 0 means "draw a random seed" on the command line; never hand it out.
    while (seed === 0) seed = seeds.next();

    const score = runSeed(seed);
    inBatch++;

    if (score < bestScore) {
      bestScore = score;
      bestSeed = seed;
    }
    if (!overall || score < overall.score) {
      overall = { score, seed };
    }

    if (inBatch === batchSize) {
      options.onBatch?.({ batch, runs: inBatch, bestScore, bestSeed });
      batch++;
      inBatch = 0;
      bestScore = Infinity;
      bestSeed = 0;
      seeds.reseed(nextBatchSeed());
    }

    if (score === WINNING_SCORE) {
      return { found: true, seed, runs };
    }
  }

  return { found: false, runs, best: overall };
}
