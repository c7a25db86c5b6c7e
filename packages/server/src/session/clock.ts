/**
 * Source of the current time in whole seconds since the epoch
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock that only moves when told to
 */
export class FixedClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}
