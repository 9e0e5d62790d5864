import { describe, it, expect } from "vitest";
import { CRand, randomSeed } from "../src/engine";
import { RAND_MAX } from "../src/engine/rng";

describe("CRand", () => {
  it("reproduces the C library rand() stream for seed 1", () => {
    const rng = new CRand(1);
    expect([rng.next(), rng.next(), rng.next(), rng.next()]).toEqual([
      1804289383, 846930886, 1681692777, 1714636915,
    ]);
  });

  it("reproduces the stream for seed 42", () => {
    const rng = new CRand(42);
    expect([rng.next(), rng.next()]).toEqual([71876166, 708592740]);
  });

  it("treats seed 0 like seed 1", () => {
    const zero = new CRand(0);
    const one = new CRand(1);
    expect(zero.next()).toBe(one.next());
    expect(zero.next()).toBe(one.next());
  });

  it("takes seeds modulo 2^32", () => {
    const a = new CRand(7);
    const b = new CRand(7 + 2 ** 32);
    for (let i = 0; i < 5; i++) expect(a.next()).toBe(b.next());
  });

  it("reseed restarts the stream", () => {
    const rng = new CRand(9);
    const first = [rng.next(), rng.next()];
    rng.next();
    rng.reseed(9);
    expect([rng.next(), rng.next()]).toEqual(first);
    expect(first).toEqual([444454915, 1502197874]);
  });

  it("stays within [0, RAND_MAX]", () => {
    const rng = new CRand(123456789);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(RAND_MAX);
    }
  });
});

describe("randomSeed", () => {
  it("derives a non-zero seed from the clock, the same one for the same instant", () => {
    const seed = randomSeed(1_700_000_000_000);
    expect(seed).toBeGreaterThan(0);
    expect(seed).toBe(new CRand(1_700_000_000_000).next());
    expect(randomSeed(1_700_000_000_000)).toBe(seed);
  });
});
