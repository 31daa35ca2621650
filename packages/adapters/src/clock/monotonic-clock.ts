import { performance } from 'node:perf_hooks';
import type { MonotonicClockPort } from '@biostream/domain';

/** Process-wide monotonic clock; unaffected by wall-clock adjustments. */
export const performanceClock: MonotonicClockPort = {
  nowMs: () => performance.now(),
};

/**
 * Manually driven clock. Starts at `startMs` and only moves when told to,
 * never backwards.
 */
export class ManualClock implements MonotonicClockPort {
  private currentMs: number;

  constructor(startMs = 0) {
    this.currentMs = startMs;
  }

  nowMs(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    if (ms < 0) throw new RangeError('ManualClock cannot move backwards');
    this.currentMs += ms;
  }
}
