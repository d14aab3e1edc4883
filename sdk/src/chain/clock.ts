export interface Clock {
  /** Current time in unix seconds. */
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) throw new RangeError('ManualClock: time cannot move backwards');
    this.current = timestamp;
  }

  advance(seconds: bigint): bigint {
    if (seconds < 0n) throw new RangeError('ManualClock: advance must be >= 0');
    this.current += seconds;
    return this.current;
  }
}
