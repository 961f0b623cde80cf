export const isoNow = (): string => new Date().toISOString();

/** Source of ledger time in whole Unix seconds. */
export interface Clock {
  nowSeconds(): number;
}

export const systemClock: Clock = {
  nowSeconds: () => Math.floor(Date.now() / 1000),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: number) {}

  nowSeconds(): number {
    return this.current;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}

export const HOUR = 60 * 60;
export const DAY = 24 * HOUR;
export const WEEK = 7 * DAY;
