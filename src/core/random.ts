// ── Seeded random source (mulberry32) ───────────────────────────────
// Every random decision in a run flows through one of these so a seed
// reproduces the same video.

export class RandomSource {
  readonly seed: number;
  private state: number;
  private spare: number | null = null;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    if (max < min) throw new Error(`RandomSource.int: max ${max} < min ${min}`);
    return min + Math.floor(this.next() * (max - min + 1));
  }

  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Normal deviate (Box–Muller, caching the second value) */
  gaussian(mean = 0, stdDev = 1): number {
    if (this.spare !== null) {
      const z = this.spare;
      this.spare = null;
      return mean + z * stdDev;
    }
    let u = 0;
    while (u === 0) u = this.next();
    const v = this.next();
    const mag = Math.sqrt(-2 * Math.log(u));
    this.spare = mag * Math.sin(2 * Math.PI * v);
    return mean + mag * Math.cos(2 * Math.PI * v) * stdDev;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("RandomSource.pick: empty list");
    return items[this.int(0, items.length - 1)];
  }

  /** Independent stream derived from this seed and a salt; does not advance this one */
  fork(salt: number): RandomSource {
    let h = (this.seed ^ Math.imul(salt + 1, 0x9e3779b1)) >>> 0;
    h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
    h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
    return new RandomSource((h ^ (h >>> 16)) >>> 0);
  }
}
