// src/engine/rng.ts
//
// Seeded generator reproducing the C library rand() stream (additive feedback,
// degree 31, separation 3). Matching it bit for bit keeps seeds reported by
// earlier tools replayable here.

const DEGREE = 31;
const SEPARATION = 3;
const DISCARD = DEGREE * 10;

export const RAND_MAX = 0x7fffffff;

export class CRand {
  private readonly state = new Uint32Array(DEGREE);
  private front = SEPARATION;
  private rear = 0;

  constructor(seed: number) {
    this.reseed(seed);
  }

  reseed(seed: number): void {
    // Seeds are unsigned 32-bit; 0 behaves like 1.
    const s = seed >>> 0 || 1;

    let word = s | 0;
    this.state[0] = word >>> 0;
    for (let i = 1; i < DEGREE; i++) {
      // Schrage's method for 16807 * word mod (2^31 - 1) without overflow.
      const hi = Math.trunc(word / 127773);
      const lo = word % 127773;
      word = 16807 * lo - 2836 * hi;
      if (word < 0) word += RAND_MAX;
      this.state[i] = word >>> 0;
    }

    this.front = SEPARATION;
    this.rear = 0;
    for (let i = 0; i < DISCARD; i++) this.next();
  }

  /** Next value in [0, RAND_MAX]. */
  next(): number {
    const value = (this.state[this.front] + this.state[this.rear]) >>> 0;
    this.state[this.front] = value;

    this.front = (this.front + 1) % DEGREE;
    this.rear = (this.rear + 1) % DEGREE;

    return value >>> 1;
  }
}

/**
 * Fresh non-zero seed derived from the clock, drawn the way the reference
 * tool does it: seed a generator with the time and take its first output.
 */
export function randomSeed(now: number = Date.now()): number {
  const rng = new CRand(now);
  let seed = rng.next();
  while (seed === 0) seed = rng.next();
  return seed;
}
