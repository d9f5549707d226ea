/**
 * Source of the ledger's current time, in unix seconds
 */
export interface Clock {
  now(): number;
}

/**
 * Wall clock that never reports an earlier time than it already has,
 * even if the system clock is stepped back
 */
export class MonotonicClock implements Clock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  now(): number {
    const seconds = Math.floor(this.source() / 1000);
    if (seconds > this.last) {
      this.last = seconds;
    }
    return this.last;
  }
}
