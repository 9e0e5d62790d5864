import { afterEach, describe, it, expect } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { startWsServer, type WsServerHandle } from "../src/server/wsServer";
import type { ServerMessage } from "../src/server/protocol";
import { watchRemote } from "../src/ui/wsWatchClient";
import { RecordingPresenter, mv } from "./helpers";

function makeQueue(ws: WebSocket) {
  const q: ServerMessage[] = [];
  let resolve: ((m: ServerMessage) => void) | null = null;

  ws.on("message", (d) => {
    const m: ServerMessage = JSON.parse(d.toString());
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(m);
    } else {
      q.push(m);
    }
  });

  return async (): Promise<ServerMessage> => {
    const queued = q.shift();
    if (queued) return queued;
    return await new Promise<ServerMessage>((r) => (resolve = r));
  };
}

async function nextWithTimeout(next: () => Promise<ServerMessage>, label: string, ms = 2000) {
  return await Promise.race([
    next(),
    new Promise<ServerMessage>((_, reject) =>
      setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms)
    ),
  ]);
}

async function connect(port: number) {
  const ws = new WebSocket(`ws://127.0.0.1:${port}`);
  const next = makeQueue(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });
  return { ws, next };
}

describe("wsServer integration", () => {
  let server: WsServerHandle | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it("welcome -> simulate -> started, frames, ended", async () => {
    server = await startWsServer({ port: 0, boardSize: 5, frameDelayMs: 1, drawSeed: () => 42 });
    const { ws, next } = await connect(server.port);

    expect(await nextWithTimeout(next, "welcome")).toMatchObject({ type: "welcome" });

    ws.send(JSON.stringify({ type: "simulate", seed: 42, reqId: "s1" }));

    const started = await nextWithTimeout(next, "simulationStarted");
    expect(started).toMatchObject({ type: "simulationStarted", seed: 42, boardSize: 5, score: 12, reqId: "s1" });

    const frames: ServerMessage[] = [];
    for (let i = 0; i < 4; i++) frames.push(await nextWithTimeout(next, `frame ${i + 1}`));
    expect(frames.map((f) => (f.type === "frame" ? f.moveNumber : f.type))).toEqual([1, 2, 3, 4]);

    const ended = await nextWithTimeout(next, "simulationEnded");
    expect(ended).toEqual({
      type: "simulationEnded",
      seed: 42,
      score: 8,
      moveCount: 4,
      moves: [mv(2, 0, 2, 2), mv(2, 3, 2, 1), mv(4, 2, 2, 2), mv(1, 2, 3, 2)],
      reqId: "s1",
    });

    ws.close();
  });

  it("answers invalid JSON and invalid requests with errors", async () => {
    server = await startWsServer({ port: 0, boardSize: 5 });
    const { ws, next } = await connect(server.port);
    await nextWithTimeout(next, "welcome");

    ws.send("{not json");
    expect(await nextWithTimeout(next, "bad json")).toEqual({
      type: "error",
      code: "BAD_MESSAGE",
      message: "Message is not valid JSON.",
    });

    ws.send(JSON.stringify({ type: "simulate", boardSize: 6, reqId: "bad" }));
    expect(await nextWithTimeout(next, "bad size")).toMatchObject({
      type: "error",
      code: "INVALID_BOARD_SIZE",
      reqId: "bad",
    });

    ws.close();
  });

  it("answers queued requests in order", async () => {
    server = await startWsServer({ port: 0, boardSize: 5 });
    const { ws, next } = await connect(server.port);
    await nextWithTimeout(next, "welcome");

    ws.send(JSON.stringify({ type: "simulate", seed: 42, reqId: "a" }));
    ws.send(JSON.stringify({ type: "hello", reqId: "b" }));

    const seen: string[] = [];
    for (let i = 0; i < 7; i++) {
      const m = await nextWithTimeout(next, `message ${i}`);
      seen.push(`${m.type}:${m.reqId ?? ""}`);
    }

    expect(seen).toEqual([
      "simulationStarted:a",
      "frame:a",
      "frame:a",
      "frame:a",
      "frame:a",
      "simulationEnded:a",
      "welcome:b",
    ]);

    ws.close();
  });

  it("watchRemote presents a streamed simulation", async () => {
    server = await startWsServer({ port: 0, boardSize: 5 });
    const presenter = new RecordingPresenter();

    const result = await watchRemote(`ws://127.0.0.1:${server.port}`, 42, presenter);

    expect(result).toEqual({
      seed: 42,
      boardSize: 5,
      score: 8,
      moves: [mv(2, 0, 2, 2), mv(2, 3, 2, 1), mv(4, 2, 2, 2), mv(1, 2, 3, 2)],
    });
    expect(presenter.boards).toHaveLength(5);
    expect(presenter.frames.map((f) => f.score)).toEqual([11, 10, 9, 8]);
    expect(presenter.summaries).toEqual([result]);
  });

  it("watchRemote rejects on a server error", async () => {
    server = await startWsServer({ port: 0, boardSize: 5 });

    await expect(watchRemote(`ws://127.0.0.1:${server.port}`, 2 ** 32, new RecordingPresenter())).rejects.toThrow(
      "watchRemote: INVALID_SEED"
    );
  });
});

async function startScriptedServer(onRequest: (ws: WebSocket, request: { reqId?: string }) => void) {
  const wss = new WebSocketServer({ port: 0 });
  await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
  const address = wss.address();
  const port = typeof address === "object" && address ? address.port : 0;

  wss.on("connection", (ws) => {
    ws.on("message", (d) => onRequest(ws, JSON.parse(d.toString())));
  });

  return { wss, port };
}

describe("watchRemote against a misbehaving server", () => {
  let wss: WebSocketServer | null = null;

  afterEach(async () => {
    if (!wss) return;
    for (const client of wss.clients) client.terminate();
    const closing = wss;
    await new Promise<void>((resolve) => closing.close(() => resolve()));
    wss = null;
  });

  it("rejects when the connection closes before the simulation ends", async () => {
    const scripted = await startScriptedServer((ws) => ws.close());
    wss = scripted.wss;

    await expect(watchRemote(`ws://127.0.0.1:${scripted.port}`, 42, new RecordingPresenter())).rejects.toThrow(
      "watchRemote: connection closed before the simulation ended"
    );
  });

  it("rejects when a streamed board cannot be read", async () => {
    const scripted = await startScriptedServer((ws, request) => {
      ws.send(
        JSON.stringify({
          type: "simulationStarted",
          seed: 42,
          boardSize: 5,
          board: ["x"],
          score: 12,
          reqId: request.reqId,
        })
      );
    });
    wss = scripted.wss;
    const presenter = new RecordingPresenter();

    await expect(watchRemote(`ws://127.0.0.1:${scripted.port}`, 42, presenter)).rejects.toThrow(
      '[deserializeBoard] unknown symbol "x" at (0, 0)'
    );
    expect(presenter.boards).toEqual([]);
  });
});
