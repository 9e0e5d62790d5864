// Public engine surface

export { createBoard, readCell, cloneBoard, isValidBoardSize } from "./board";
export { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE, MIN_BOARD_SIZE, initialScore } from "./constants";

export { findMove, listMoves } from "./findMove";
export { applyMove } from "./applyMove";
export { scoreBoard } from "./score";

export { CRand, randomSeed } from "./rng";

export { Simulation, runSimulation } from "./simulation";
export type { SimulationOptions, RunSimulationOptions } from "./simulation";

export { searchBestSeed, DEFAULT_SEARCH_BATCH_SIZE, WINNING_SCORE } from "./search";
export type { BatchReport, SearchOptions, SearchResult } from "./search";

// Board text form (shared by the console and WebSocket presenters)
export { serializeBoard, deserializeBoard } from "./serialization";

export { validateBoard } from "./validateBoard";
