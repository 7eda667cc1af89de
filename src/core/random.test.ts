import { describe, expect, it } from "vitest";
import { RandomSource } from "./random.js";

describe("RandomSource", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = new RandomSource(42);
    const b = new RandomSource(42);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    const a = new RandomSource(1);
    const b = new RandomSource(2);
    expect(a.next()).not.toBe(b.next());
  });

  it("keeps next() within [0, 1)", () => {
    const rng = new RandomSource(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("int() covers both bounds inclusively", () => {
    const rng = new RandomSource(99);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) seen.add(rng.int(3, 6));
    expect([...seen].sort()).toEqual([3, 4, 5, 6]);
  });

  it("int() rejects an inverted range", () => {
    expect(() => new RandomSource(1).int(5, 4)).toThrow("max 4 < min 5");
  });

  it("gaussian() centres on the mean", () => {
    const rng = new RandomSource(123);
    let sum = 0;
    const n = 5000;
    for (let i = 0; i < n; i++) sum += rng.gaussian(0.5, 0.08);
    expect(sum / n).toBeCloseTo(0.5, 2);
  });

  it("pick() throws on an empty list", () => {
    expect(() => new RandomSource(1).pick([])).toThrow("empty list");
  });

  it("fork() is deterministic and does not advance the parent", () => {
    const parent = new RandomSource(5);
    const forkA = parent.fork(3).next();
    const forkB = parent.fork(3).next();
    expect(forkA).toBe(forkB);
    expect(parent.next()).toBe(new RandomSource(5).next());
    expect(parent.fork(4).next()).not.toBe(forkA);
  });
});
