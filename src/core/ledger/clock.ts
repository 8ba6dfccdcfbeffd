// ================================================================================================
// CLOCK: source of the "current block time" in unix seconds
// ================================================================================================

export interface Clock {
  now(): number;
}

/** Deterministic clock driven by the caller (tests, simulations) */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}

export const HOUR = 60 * 60;
export const DAY = 24 * HOUR;
export const WEEK = 7 * DAY;
