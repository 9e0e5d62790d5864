// src/ui/cli.ts
//
// Argument parsing and command execution. Commands take their collaborators
// (config, output, presenter) as parameters so they run the same under tests.

import type { AppConfig } from "../config";
import { UsageError } from "../config";
import { randomSeed, searchBestSeed } from "../engine";
import type { SearchResult } from "../engine";
import type { SimulationResult } from "../types";
import { playSimulation, type Presenter } from "./presenter";
import { formatBatchReport, formatWinningSeed } from "./render";

export type CliCommand =
  | { kind: "find" }
  | { kind: "simulate"; seed: number }
  | { kind: "serve"; port?: number }
  | { kind: "watch"; seed: number; url?: string };

const MAX_SEED = 0xffffffff;

export function usage(program: string): string {
  return (
    `usage: ${program} <command> [seed]\n` +
    "\n" +
    "    available commands:\n" +
    "        find            run until a solution with score 1 is found\n" +
    "        simulate        simulate a game from given seed\n" +
    "        serve           stream simulations to WebSocket clients\n" +
    "        watch           watch a simulation streamed by a running server\n" +
    "\n" +
    "    arguments:\n" +
    "        seed            provide seed for a given simulation, only\n" +
    '                        used when command is "simulate" or "watch".\n' +
    "                        use seed 0 for random seed.\n" +
    '        port            port for "serve" (default PEG_WS_PORT or 8787)\n' +
    '        url             server for "watch" (default PEG_WS_URL or ws://localhost:8787)\n'
  );
}

/** Decimal integer in [0, 2^32). */
export function parseSeed(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n <= MAX_SEED ? n : null;
}

function parsePort(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n <= 65535 ? n : null;
}

/**
 * Throws UsageError with the message to print; the caller owns the exit code.
 */
export function parseArgs(args: readonly string[], program = "peg-solitaire"): CliCommand {
  const [command, ...rest] = args;

  if (command === "find" && rest.length === 0) {
    return { kind: "find" };
  }

  if (command === "simulate" && rest.length === 1) {
    const seed = parseSeed(rest[0]);
    if (seed === null) throw new UsageError("unable to parse seed");
    return { kind: "simulate", seed };
  }

  if (command === "serve" && rest.length <= 1) {
    if (rest.length === 0) return { kind: "serve" };
    const port = parsePort(rest[0]);
    if (port === null) throw new UsageError("unable to parse port");
    return { kind: "serve", port };
  }

  if (command === "watch" && (rest.length === 1 || rest.length === 2)) {
    const seed = parseSeed(rest[0]);
    if (seed === null) throw new UsageError("unable to parse seed");
    return rest.length === 2 ? { kind: "watch", seed, url: rest[1] } : { kind: "watch", seed };
  }

  throw new UsageError(usage(program));
}

export type CliIO = {
  out: (line: string) => void;
};

export type FindOverrides = {
  maxRuns?: number;
  nextBatchSeed?: () => number;
};

export function runFind(config: AppConfig, io: CliIO, overrides: FindOverrides = {}): SearchResult {
  const result = searchBestSeed({
    boardSize: config.boardSize,
    batchSize: config.searchBatchSize,
    maxRuns: overrides.maxRuns,
    nextBatchSeed: overrides.nextBatchSeed,
    onBatch: (report) => io.out(formatBatchReport(report.runs, report.bestScore, report.bestSeed)),
  });

  if (result.found) io.out(formatWinningSeed(result.seed));
  return result;
}

export async function runSimulate(
  seed: number,
  config: AppConfig,
  presenter: Presenter
): Promise<SimulationResult> {
  const actualSeed = seed === 0 ? randomSeed() : seed;
  return playSimulation(actualSeed, presenter, {
    boardSize: config.boardSize,
    delayMs: config.frameDelayMs,
  });
}
