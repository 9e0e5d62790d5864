// src/engine/constants.ts

export const DEFAULT_BOARD_SIZE = 9;

// Below 5 the corner cutouts overlap and the cross degenerates.
export const MIN_BOARD_SIZE = 5;

// Upper bound for sizes read from config or requested over the wire.
export const MAX_BOARD_SIZE = 25;

// Unusable cells per corner (an L of three) times four corners.
export const UNUSABLE_CELL_COUNT = 12;

// Fixed check order; changing it changes which seeds win.
export const DIRECTIONS: readonly (readonly [number, number])[] = [
  [0, 1],
  [1, 0],
  [-1, 0],
  [0, -1],
];

export function initialScore(size: number): number {
  return size * size - UNUSABLE_CELL_COUNT - 1;
}

export function normalizeIndex(i: number, size: number): number {
  return ((i % size) + size) % size;
}
