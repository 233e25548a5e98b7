/**
 * Time source abstraction. Components that reason about elapsed time
 * (sustained-duration tracking, sliding windows, sample timestamps) read
 * time through a Clock so that tests can drive it explicitly.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock advanced by hand.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
