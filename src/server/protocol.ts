// src/server/protocol.ts

import type { Move } from "../types";

export const SERVER_VERSION = "peg-ws-1";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | SimulateMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Run one simulation and stream it back.
 * seed 0 (or absent) asks the server to draw a fresh seed.
 */
export interface SimulateMessage {
  type: "simulate";
  seed?: number;
  boardSize?: number;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | SimulationStartedMessage
  | FrameMessage
  | SimulationEndedMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface SimulationStartedMessage {
  type: "simulationStarted";
  seed: number;
  boardSize: number;

  // Rows of " ", "." and "@"
  board: string[];
  score: number;
  reqId?: string;
}

export interface FrameMessage {
  type: "frame";
  seed: number;
  moveNumber: number;
  move: Move;
  board: string[];
  score: number;
  reqId?: string;
}

export interface SimulationEndedMessage {
  type: "simulationEnded";
  seed: number;
  score: number;
  moveCount: number;
  moves: Move[];
  reqId?: string;
}

export type ErrorCode = "BAD_MESSAGE" | "INVALID_SEED" | "INVALID_BOARD_SIZE";

export interface ErrorMessage {
  type: "error";
  code: ErrorCode;
  message: string;
  reqId?: string;
}
