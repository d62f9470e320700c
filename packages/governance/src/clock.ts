/**
 * Time sources. All governance timestamps are whole Unix seconds.
 */

export type Timestamp = number;

export const SECONDS_PER_DAY = 86_400;

export interface Clock {
  now(): Timestamp;
}

/** Wall clock rounded down to the second */
export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/** Clock that only moves when told to */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  set(timestamp: Timestamp): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function addDays(timestamp: Timestamp, days: number): Timestamp {
  return timestamp + days * SECONDS_PER_DAY;
}
