export const SECONDS_IN_MINUTE = 60;
export const SECONDS_IN_HOUR = 60 * SECONDS_IN_MINUTE;
export const SECONDS_IN_DAY = 24 * SECONDS_IN_HOUR;
export const SECONDS_IN_WEEK = 7 * SECONDS_IN_DAY;
export const SECONDS_IN_YEAR = 365 * SECONDS_IN_DAY;

/**
 * Source of the current block timestamp (unix seconds).
 */
export interface Clock {
  now(): bigint;
}

export function unixTime(): number {
  return Math.floor(Date.now() / 1000);
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(unixTime());
  }
}

/**
 * Clock that only moves when told to, for simulations and replays.
 */
export class ManualClock implements Clock {
  private timestamp: bigint;

  constructor(timestamp: bigint | number = unixTime()) {
    this.timestamp = BigInt(timestamp);
  }

  now(): bigint {
    return this.timestamp;
  }

  increase(seconds: bigint | number): bigint {
    this.timestamp += BigInt(seconds);
    return this.timestamp;
  }

  increaseTo(timestamp: bigint | number): bigint {
    this.timestamp = BigInt(timestamp);
    return this.timestamp;
  }
}
