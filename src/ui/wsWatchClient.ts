// src/ui/wsWatchClient.ts
//
// Remote viewer: asks a peg solitaire WS server for a simulation and hands
// every streamed board to a presenter.
//
// Env:
//   PEG_WS_URL=ws://localhost:8787

import WebSocket from "ws";

import type { Move, SimulationResult } from "../types";
import { deserializeBoard } from "../engine";
import type { ServerMessage } from "../server/protocol";
import type { Presenter } from "./presenter";

export const DEFAULT_WS_URL = "ws://localhost:8787";

function parseServerMessage(data: WebSocket.RawData): ServerMessage | null {
  try {
    const parsed: unknown = JSON.parse(data.toString());
    if (parsed && typeof parsed === "object" && "type" in parsed && typeof parsed.type === "string") {
      return parsed as ServerMessage;
    }
    return null;
  } catch {
    return null;
  }
}

export function watchRemote(url: string, seed: number, presenter: Presenter): Promise<SimulationResult> {
  const reqId = `watch-${seed}-${Date.now()}`;

  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    let boardSize = 0;
    let settled = false;
    const moves: Move[] = [];

    const fail = (err: Error) => {
      if (settled) return;
      settled = true;
      ws.close();
      reject(err);
    };

    const finish = (result: SimulationResult) => {
      settled = true;
      ws.close();
      resolve(result);
    };

    const onServerMessage = (msg: ServerMessage) => {
      switch (msg.type) {
        case "simulationStarted":
          boardSize = msg.boardSize;
          presenter.showBoard(deserializeBoard(msg.board));
          return;

        case "frame": {
          const board = deserializeBoard(msg.board);
          moves.push(msg.move);
          presenter.showBoard(board, { moveNumber: msg.moveNumber, move: msg.move, score: msg.score, board });
          return;
        }

        case "simulationEnded": {
          const result: SimulationResult = { seed: msg.seed, boardSize, score: msg.score, moves };
          presenter.showSummary(result);
          finish(result);
          return;
        }

        case "error":
          return fail(new Error(`watchRemote: ${msg.code}: ${msg.message}`));

        default:
          return;
      }
    };

    ws.on("open", () => {
      ws.send(JSON.stringify({ type: "simulate", seed, reqId }));
    });

    ws.on("message", (data) => {
      if (settled) return;
      const msg = parseServerMessage(data);
      if (!msg) return fail(new Error("watchRemote: server sent an unreadable message"));
      if (msg.reqId !== reqId) return;

      try {
        onServerMessage(msg);
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });

    ws.on("close", () => {
      fail(new Error("watchRemote: connection closed before the simulation ended"));
    });

    ws.on("error", fail);
  });
}
