import type { Address } from 'viem';
import type { BuyIntent, MineIntent, MiningAuctionState, TreasuryAuctionState } from '@dutchmine/sdk';
import { BPS_DIVISOR, WAD, mulDiv, secondsUntilPrice } from '@dutchmine/sdk';

export type WaitPlan = {
  action: 'wait';
  reason: string;
  // Timestamp at which the plan is expected to flip to `settle`, when known.
  until?: bigint;
};

export type Plan<I> = { action: 'settle'; intent: I; price: bigint } | WaitPlan;

export type MinePlanConfig = {
  miner: Address;
  maxPrice: bigint;
  uri: string;
  deadlineSlackSec: bigint;
};

export type Holding = { asset: Address; balance: bigint };

export type BuyPlanConfig = {
  assetsReceiver: Address;
  minProfitBps: bigint;
  deadlineSlackSec: bigint;
};

/**
 * Mine as soon as the decaying price is at or below `maxPrice`.
 *
 * The intent pins the epoch that was read and caps the payment at the price
 * observed at that block; the price only falls within an epoch, so the cap
 * holds unless another settle lands first.
 */
export function planMine(state: MiningAuctionState, cfg: MinePlanConfig): Plan<MineIntent> {
  const { epoch, price } = state;

  if (price > cfg.maxPrice) {
    return {
      action: 'wait',
      reason: 'price above maxPrice',
      until: secondsUntilPrice(epoch.initPrice, epoch.startTime, state.epochPeriod, cfg.maxPrice),
    };
  }

  return {
    action: 'settle',
    price,
    intent: {
      miner: cfg.miner,
      epochId: epoch.epochId,
      deadline: state.timestamp + cfg.deadlineSlackSec,
      maxPrice: price,
      uri: cfg.uri,
    },
  };
}

/** Payment-token value of the holdings; assets without a valuation count as zero. */
export function holdingsValue(holdings: readonly Holding[], valuations: Readonly<Record<Address, bigint>>): bigint {
  let total = 0n;
  for (const h of holdings) {
    const unitValue = valuations[h.asset];
    if (unitValue == null || h.balance === 0n) continue;
    total += mulDiv(h.balance, unitValue, WAD);
  }
  return total;
}

/**
 * Buy the treasury once its value covers the price plus `minProfitBps`.
 *
 * Only assets with a non-zero balance are swept.
 */
export function planBuy(
  state: TreasuryAuctionState,
  holdings: readonly Holding[],
  valuations: Readonly<Record<Address, bigint>>,
  cfg: BuyPlanConfig,
): Plan<BuyIntent> {
  const assets = holdings.filter((h) => h.balance > 0n).map((h) => h.asset);
  if (assets.length === 0) return { action: 'wait', reason: 'treasury is empty' };

  const value = holdingsValue(holdings, valuations);
  const hurdle = BPS_DIVISOR + cfg.minProfitBps;
  const { epoch, price } = state;

  if (value * BPS_DIVISOR < price * hurdle) {
    const affordable = mulDiv(value, BPS_DIVISOR, hurdle);
    return {
      action: 'wait',
      reason: 'treasury value below price plus margin',
      until: secondsUntilPrice(epoch.initPrice, epoch.startTime, state.epochPeriod, affordable),
    };
  }

  return {
    action: 'settle',
    price,
    intent: {
      assets,
      assetsReceiver: cfg.assetsReceiver,
      epochId: epoch.epochId,
      deadline: state.timestamp + cfg.deadlineSlackSec,
      maxPaymentAmount: price,
    },
  };
}
