import type { AppConfig } from "../config";
import { startWsServer, type WsServerHandle } from "./wsServer";

export async function startServer(config: AppConfig, port = config.wsPort): Promise<WsServerHandle> {
  const server = await startWsServer({
    port,
    boardSize: config.boardSize,
    frameDelayMs: config.frameDelayMs,
  });

  // eslint-disable-next-line no-console
  console.log(`Peg solitaire WS server listening on ws://localhost:${server.port}`);
  // eslint-disable-next-line no-console
  console.log(
    "Options:",
    JSON.stringify({ boardSize: config.boardSize, frameDelayMs: config.frameDelayMs }, null, 2)
  );

  return server;
}
