// ============================================================================
// @phasemint/engine — Clocks
// ============================================================================

import type { Clock } from './types.js';

/** Wall-clock time, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
