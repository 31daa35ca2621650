import type { RandomSourcePort } from '@biostream/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives reproducible jitter wherever a session is built with a fixed seed.
 */
export class SeededRng implements RandomSourcePort {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

/** Live-mode source backed by `Math.random`. */
export const mathRandom: RandomSourcePort = {
  next: () => Math.random(),
};

/** Always yields the same value; handy for pinning jitter in tests. */
export function constantRandom(value: number): RandomSourcePort {
  if (!(value >= 0 && value < 1)) {
    throw new RangeError(`constant random value must be in [0, 1), got ${value}`);
  }
  return { next: () => value };
}
