// src/server/wsServer.ts
//
// WebSocket presenter. Each connection may request simulations; the replies
// from handleClientMessage are streamed back, frames spaced by frameDelayMs.
// A connection runs one simulation at a time; a request arriving while one
// is streaming is answered after it.

import { setTimeout as sleep } from "node:timers/promises";
import WebSocket, { WebSocketServer } from "ws";

import type { ServerMessage } from "./protocol";
import { SERVER_VERSION } from "./protocol";
import { handleClientMessage, makeError, safeParseJson, type HandleOptions } from "./handleMessage";

export type WsServerOptions = {
  port: number;
  boardSize: number;
  frameDelayMs?: number;
  drawSeed?: HandleOptions["drawSeed"];
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

export function startWsServer(opts: WsServerOptions): Promise<WsServerHandle> {
  const frameDelayMs = opts.frameDelayMs ?? 0;
  const wss = new WebSocketServer({ port: opts.port });

  async function stream(ws: WebSocket, replies: ServerMessage[]): Promise<void> {
    for (const reply of replies) {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (reply.type === "frame" && frameDelayMs > 0) await sleep(frameDelayMs);
      if (ws.readyState !== WebSocket.OPEN) return;
      send(ws, reply);
    }
  }

  wss.on("connection", (ws) => {
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION });

    // Serializes requests per connection.
    let queue: Promise<void> = Promise.resolve();

    ws.on("message", (data) => {
      const raw = safeParseJson(data.toString());
      if (raw === null) {
        send(ws, makeError("BAD_MESSAGE", "Message is not valid JSON."));
        return;
      }

      const replies = handleClientMessage(raw, { defaultBoardSize: opts.boardSize, drawSeed: opts.drawSeed });
      queue = queue
        .then(() => stream(ws, replies))
        .catch((err: unknown) => {
          console.error("[wsServer] stream failed:", err);
          ws.close();
        });
    });

    ws.on("error", (err) => {
      console.error("[wsServer] socket error:", err);
    });
  });

  return new Promise((resolve, reject) => {
    wss.once("error", reject);
    wss.once("listening", () => {
      const address = wss.address();
      resolve({
        port: typeof address === "object" && address ? address.port : opts.port,
        close: async () => {
          for (const client of wss.clients) client.terminate();
          await new Promise<void>((done, fail) => wss.close((err) => (err ? fail(err) : done())));
        },
      });
    });
  });
}
