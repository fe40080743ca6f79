import { performance } from 'perf_hooks';

/**
 * Millisecond time source
 */
export interface Clock {
  now(): number;
}

/**
 * Epoch-aligned monotonic clock: never steps backwards with wall-clock
 * adjustments, so bucket refills cannot be inflated by NTP corrections.
 */
export const monotonicClock: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};

/**
 * Hand-driven clock for tests and simulations
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = Date.UTC(2024, 0, 1)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
