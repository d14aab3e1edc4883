import type { Address } from 'viem';
import { zeroAddress } from 'viem';

import { BPS_DIVISOR, bpsMul } from './wad.js';

export type FeeRole = 'previousHolder' | 'team' | 'protocol' | 'treasury';

export interface FeeWeight {
  role: FeeRole;
  receiver: Address;
  bps: bigint;
}

export interface FeeShare {
  role: FeeRole;
  receiver: Address;
  amount: bigint;
}

export const PREVIOUS_HOLDER_FEE_BPS = 8_000n;
export const TEAM_FEE_BPS = 400n;
export const PROTOCOL_FEE_BPS = 100n;

/**
 * Split `total` across weighted receivers; whatever is left goes to `remainder`.
 *
 * Weights whose receiver is the zero address are dropped, so their share (and
 * all rounding dust) lands in the remainder. Amounts always sum to `total`.
 */
export function splitFee(total: bigint, weights: readonly FeeWeight[], remainder: Omit<FeeWeight, 'bps'>): FeeShare[] {
  if (total < 0n) throw new RangeError('splitFee: total must be >= 0');

  const present = weights.filter((w) => w.receiver !== zeroAddress);
  const bpsSum = present.reduce((sum, w) => sum + w.bps, 0n);
  if (bpsSum > BPS_DIVISOR) throw new RangeError('splitFee: weights exceed 100%');

  const shares: FeeShare[] = present.map((w) => ({ role: w.role, receiver: w.receiver, amount: bpsMul(total, w.bps) }));
  const explicit = shares.reduce((sum, s) => sum + s.amount, 0n);
  shares.push({ role: remainder.role, receiver: remainder.receiver, amount: total - explicit });
  return shares;
}

export function miningFeeWeights(args: { previousHolder: Address; team: Address; protocol: Address }): FeeWeight[] {
  return [
    { role: 'previousHolder', receiver: args.previousHolder, bps: PREVIOUS_HOLDER_FEE_BPS },
    { role: 'team', receiver: args.team, bps: TEAM_FEE_BPS },
    { role: 'protocol', receiver: args.protocol, bps: PROTOCOL_FEE_BPS },
  ];
}
