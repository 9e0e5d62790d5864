import type { ClientMessage, ErrorCode, ServerMessage } from "./protocol";
import { SERVER_VERSION } from "./protocol";
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE, Simulation, isValidBoardSize, randomSeed, serializeBoard } from "../engine";

export type HandleOptions = {
  defaultBoardSize: number;

  /** Used when a simulate request carries no seed (or seed 0). */
  drawSeed?: () => number;
};

const MAX_SEED = 0xffffffff;

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function optional(x: Record<string, unknown>, key: string, type: "string" | "number"): boolean {
  return !(key in x) || x[key] === undefined || typeof x[key] === type;
}

export function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (!optional(x, "reqId", "string")) return false;

  switch (x.type) {
    case "hello":
      return optional(x, "clientId", "string");
    case "simulate":
      return optional(x, "seed", "number") && optional(x, "boardSize", "number");
    default:
      return false;
  }
}

export function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  return typeof x.reqId === "string" ? x.reqId : undefined;
}

function withReqId(msg: ServerMessage, reqId?: string): ServerMessage {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

export function makeError(code: ErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

/**
 * Turn one decoded client message into the replies to send, in order.
 * Pure apart from drawing a seed when none is given.
 */
export function handleClientMessage(raw: unknown, opts: HandleOptions): ServerMessage[] {
  const reqId = getReqId(raw);

  if (!isClientMessage(raw)) {
    return [makeError("BAD_MESSAGE", "Unrecognized or malformed message.", reqId)];
  }

  const msg = raw;

  if (msg.type === "hello") {
    return [withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId: msg.clientId }, reqId)];
  }

  const requestedSeed = msg.seed ?? 0;
  if (!Number.isInteger(requestedSeed) || requestedSeed < 0 || requestedSeed > MAX_SEED) {
    return [makeError("INVALID_SEED", `Seed must be an integer in [0, ${MAX_SEED}], got ${requestedSeed}.`, reqId)];
  }

  const boardSize = msg.boardSize ?? opts.defaultBoardSize;
  if (!isValidBoardSize(boardSize)) {
    return [
      makeError(
        "INVALID_BOARD_SIZE",
        `Board size must be an odd integer in [${MIN_BOARD_SIZE}, ${MAX_BOARD_SIZE}], got ${boardSize}.`,
        reqId
      ),
    ];
  }

  const seed = requestedSeed === 0 ? (opts.drawSeed ?? randomSeed)() : requestedSeed;
  const sim = new Simulation(seed, { boardSize });

  const replies: ServerMessage[] = [
    withReqId(
      { type: "simulationStarted", seed, boardSize, board: serializeBoard(sim.board), score: sim.score },
      reqId
    ),
  ];

  for (let frame = sim.step(); frame; frame = sim.step()) {
    replies.push(
      withReqId(
        {
          type: "frame",
          seed,
          moveNumber: frame.moveNumber,
          move: frame.move,
          board: serializeBoard(frame.board),
          score: frame.score,
        },
        reqId
      )
    );
  }

  const result = sim.result();
  replies.push(
    withReqId(
      { type: "simulationEnded", seed, score: result.score, moveCount: result.moves.length, moves: [...result.moves] },
      reqId
    )
  );

  return replies;
}
