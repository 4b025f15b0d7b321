export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives reproducible sensor batches when SEED is set.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

export const mathRandom: RandomSource = { next: () => Math.random() };
