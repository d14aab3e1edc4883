// Linear Dutch-auction decay: full price at epoch start, zero once the period has elapsed.

export function priceAt(initPrice: bigint, startTime: bigint, period: bigint, now: bigint): bigint {
  if (period <= 0n) throw new Error('priceAt: period must be > 0');
  const elapsed = now <= startTime ? 0n : now - startTime;
  if (elapsed >= period) return 0n;
  return initPrice - (initPrice * elapsed) / period;
}

/**
 * Earliest timestamp at which `priceAt` is at or below `target`.
 *
 * Never later than `startTime + period`, where the price reaches zero.
 */
export function secondsUntilPrice(initPrice: bigint, startTime: bigint, period: bigint, target: bigint): bigint {
  if (period <= 0n) throw new Error('secondsUntilPrice: period must be > 0');
  if (target >= initPrice) return startTime;
  if (target < 0n) throw new Error('secondsUntilPrice: target must be >= 0');

  // price(e) <= target  <=>  floor(initPrice * e / period) >= initPrice - target
  const need = initPrice - target;
  const elapsed = (need * period + initPrice - 1n) / initPrice;
  return startTime + (elapsed < period ? elapsed : period);
}

export class PriceClock {
  public readonly period: bigint;

  constructor(period: bigint) {
    if (period <= 0n) throw new Error('PriceClock: period must be > 0');
    this.period = period;
  }

  priceAt(initPrice: bigint, startTime: bigint, now: bigint): bigint {
    return priceAt(initPrice, startTime, this.period, now);
  }

  epochEnd(startTime: bigint): bigint {
    return startTime + this.period;
  }

  crossesAt(initPrice: bigint, startTime: bigint, target: bigint): bigint {
    return secondsUntilPrice(initPrice, startTime, this.period, target);
  }
}
