// Halving-based emission with a tail floor. Rates are uint256-sized, so shifts clamp at 255.
export const MAX_HALVING_SHIFT = 255n;

export function emissionRate(
  initialRate: bigint,
  tailRate: bigint,
  halvingPeriod: bigint,
  startTime: bigint,
  now: bigint,
): bigint {
  if (halvingPeriod <= 0n) throw new Error('emissionRate: halvingPeriod must be > 0');
  const elapsed = now <= startTime ? 0n : now - startTime;
  let halvings = elapsed / halvingPeriod;
  if (halvings > MAX_HALVING_SHIFT) halvings = MAX_HALVING_SHIFT;
  const candidate = initialRate >> halvings;
  return candidate < tailRate ? tailRate : candidate;
}

/** Units a holder has earned but not yet been minted: `heldDuration * rate`. */
export function accruedEmission(startTime: bigint, rate: bigint, now: bigint): bigint {
  return (now > startTime ? now - startTime : 0n) * rate;
}

export class EmissionSchedule {
  public readonly initialRate: bigint;
  public readonly tailRate: bigint;
  public readonly halvingPeriod: bigint;
  public readonly startTime: bigint;

  constructor(initialRate: bigint, tailRate: bigint, halvingPeriod: bigint, startTime: bigint) {
    if (halvingPeriod <= 0n) throw new Error('EmissionSchedule: halvingPeriod must be > 0');
    if (tailRate > initialRate) throw new Error('EmissionSchedule: tailRate must be <= initialRate');
    this.initialRate = initialRate;
    this.tailRate = tailRate;
    this.halvingPeriod = halvingPeriod;
    this.startTime = startTime;
  }

  halvingsAt(now: bigint): bigint {
    if (now <= this.startTime) return 0n;
    return (now - this.startTime) / this.halvingPeriod;
  }

  rateAt(now: bigint): bigint {
    return emissionRate(this.initialRate, this.tailRate, this.halvingPeriod, this.startTime, now);
  }

  // Undefined once the floor is reached: further halvings no longer change the rate.
  nextHalvingAt(now: bigint): bigint | undefined {
    if (this.rateAt(now) === this.tailRate) return undefined;
    return this.startTime + (this.halvingsAt(now) + 1n) * this.halvingPeriod;
  }
}
