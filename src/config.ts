// src/config.ts
//
// Environment-driven settings shared by the CLI and the WebSocket presenter.
//
// Env:
//   PEG_BOARD_SIZE=9
//   PEG_FRAME_DELAY_MS=500
//   PEG_SEARCH_BATCH_SIZE=100000
//   PEG_WS_PORT=8787
//   PEG_CLEAR_SCREEN=1     (console presenter clears between frames)
//   PEG_VALIDATE_BOARD=0   (disables per-move board validation; read by the engine)

import {
  DEFAULT_BOARD_SIZE,
  DEFAULT_SEARCH_BATCH_SIZE,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  isValidBoardSize,
} from "./engine";

export type Env = Record<string, string | undefined>;

export type AppConfig = {
  boardSize: number;
  frameDelayMs: number;
  searchBatchSize: number;
  wsPort: number;
  clearScreen: boolean;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const boardSize = envInt(env, "PEG_BOARD_SIZE", DEFAULT_BOARD_SIZE);
  if (!isValidBoardSize(boardSize)) {
    throw new UsageError(
      `PEG_BOARD_SIZE must be an odd integer in [${MIN_BOARD_SIZE}, ${MAX_BOARD_SIZE}], got ${boardSize}`
    );
  }

  const searchBatchSize = envInt(env, "PEG_SEARCH_BATCH_SIZE", DEFAULT_SEARCH_BATCH_SIZE);
  if (searchBatchSize <= 0) {
    throw new UsageError(`PEG_SEARCH_BATCH_SIZE must be positive, got ${searchBatchSize}`);
  }

  return {
    boardSize,
    frameDelayMs: Math.max(0, envInt(env, "PEG_FRAME_DELAY_MS", 500)),
    searchBatchSize,
    wsPort: envInt(env, "PEG_WS_PORT", 8787),
    clearScreen: envFlag(env, "PEG_CLEAR_SCREEN", true),
  };
}
