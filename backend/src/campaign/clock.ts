export interface Clock {
  /** Current time in unix seconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Clock that only moves when told to; used by tests and the debug routes. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = systemClock.now()) {
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
