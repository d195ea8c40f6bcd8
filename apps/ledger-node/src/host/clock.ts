/**
 * Ledger time source, in whole unix seconds.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Settable clock for tests and replays. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
