/**
 * Seeded PRNG (mulberry32)
 *
 * All world randomness (scatter, respawn type and quantity) goes through this
 * so a world built from the same seed and fed the same actions replays
 * identically.
 */
export class SeededRng {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed | 0;
  }

  /** Returns a float in [0, 1) */
  next(): number {
    this.seed = (this.seed + 0x6d2b79f5) | 0;
    let t = Math.imul(this.seed ^ (this.seed >>> 15), 1 | this.seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Returns an integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.next() * max);
  }

  /** Returns an integer in [min, max] */
  nextIntInclusive(min: number, max: number): number {
    return min + this.nextInt(max - min + 1);
  }

  /** Uniform pick from a non-empty list */
  pick<T>(items: readonly T[]): T {
    const item = items[this.nextInt(items.length)];
    if (item === undefined) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return item;
  }
}
