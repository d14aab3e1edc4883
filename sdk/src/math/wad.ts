export const WAD = 10n ** 18n;
export const BPS_DIVISOR = 10_000n;

export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) throw new Error('mulDiv: division by zero');
  return (a * b) / c;
}

export function bpsMul(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, bps, BPS_DIVISOR);
}

export function wadMul(a: bigint, b: bigint): bigint {
  return mulDiv(a, b, WAD);
}

export function clamp(x: bigint, lo: bigint, hi: bigint): bigint {
  if (lo > hi) throw new Error('clamp: lo must be <= hi');
  if (x < lo) return lo;
  if (x > hi) return hi;
  return x;
}

export function wadToDecimal(w: bigint, decimals: number): string {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error('wadToDecimal: decimals must be a non-negative integer');
  }

  const sign = w < 0n ? '-' : '';
  const abs = w < 0n ? -w : w;

  const integer = abs / WAD;
  if (decimals === 0) return `${sign}${integer}`;

  const frac = abs % WAD;
  const scale = 10n ** BigInt(decimals);
  const fracDec = mulDiv(frac, scale, WAD);
  const fracStr = fracDec.toString().padStart(decimals, '0');

  return `${sign}${integer}.${fracStr}`;
}
