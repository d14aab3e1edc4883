import { describe, expect, it } from 'vitest';

import { zeroAddress } from 'viem';

import {
  DeadlinePassed,
  EmptyAssets,
  EpochIdMismatch,
  InsufficientAllowance,
  InvalidRecipient,
  MaxPriceExceeded,
  OutOfRange,
  UnknownAsset,
  ZeroAddress,
} from '../src/auction/errors.js';
import type { TreasuryAuctionEvents } from '../src/auction/treasury-auction.js';
import {
  ALICE,
  BOB,
  BURN,
  CAROL,
  E18,
  MINING,
  OTHER_ASSET,
  START,
  TREASURY,
  WETH,
  deployMining,
  deployTreasury,
  fund,
  world,
} from './fixtures.js';

const FAR = START + 100_000n;

function catchErr(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('TreasuryAuction construction', () => {
  it('opens epoch 0 at the configured initial price', () => {
    const w = world();
    const auction = deployTreasury(w);
    expect(auction.epoch()).toEqual({ epochId: 0n, initPrice: E18, startTime: START });
    expect(auction.getPrice()).toBe(E18);
  });

  it('validates addresses and bounds', () => {
    const w = world();
    expect(catchErr(() => deployTreasury(w, { paymentReceiver: zeroAddress }))).toBeInstanceOf(ZeroAddress);
    expect(catchErr(() => deployTreasury(w, { paymentToken: zeroAddress }))).toMatchObject({ field: 'paymentToken' });
    expect(catchErr(() => deployTreasury(w, { initPrice: 10n }))).toMatchObject({ param: 'initPrice' });
    expect(catchErr(() => deployTreasury(w, { epochPeriod: 400n * 24n * 3600n }))).toBeInstanceOf(OutOfRange);
    expect(catchErr(() => deployTreasury(w, { priceMultiplier: 4n * E18 }))).toMatchObject({ param: 'priceMultiplier' });
  });
});

describe('TreasuryAuction.buy', () => {
  it('sweeps full balances, skipping empty assets', () => {
    const w = world();
    const auction = deployTreasury(w);
    fund(w, w.lp, ALICE, 10n * E18, TREASURY);
    fund(w, w.weth, TREASURY, 10n, TREASURY);

    const swept: Array<TreasuryAuctionEvents['Swept']> = [];
    const buys: Array<TreasuryAuctionEvents['Buy']> = [];
    auction.on('Swept', (e) => swept.push(e));
    auction.on('Buy', (e) => buys.push(e));

    w.clock.set(START + 1800n);
    const paid = auction.buy(ALICE, {
      assets: [WETH, OTHER_ASSET],
      assetsReceiver: BOB,
      epochId: 0n,
      deadline: FAR,
      maxPaymentAmount: E18,
    });

    expect(paid).toBe(500_000_000_000_000_000n);
    expect(w.weth.balanceOf(BOB)).toBe(10n);
    expect(w.weth.balanceOf(TREASURY)).toBe(0n);
    expect(w.other.balanceOf(BOB)).toBe(0n);
    expect(w.lp.balanceOf(BURN)).toBe(500_000_000_000_000_000n);
    expect(w.lp.balanceOf(ALICE)).toBe(9_500_000_000_000_000_000n);

    expect(auction.epoch()).toEqual({ epochId: 1n, initPrice: 600_000_000_000_000_000n, startTime: START + 1800n });
    expect(swept).toEqual([{ asset: WETH, assetsReceiver: BOB, amount: 10n }]);
    expect(buys).toEqual([{ buyer: ALICE, assetsReceiver: BOB, paymentAmount: 500_000_000_000_000_000n }]);
  });

  it('checks assets, deadline, epoch and price in that order', () => {
    const w = world();
    const auction = deployTreasury(w);
    const base = { assets: [WETH], assetsReceiver: BOB, epochId: 0n, deadline: FAR, maxPaymentAmount: E18 };

    expect(catchErr(() => auction.buy(ALICE, { ...base, assets: [], deadline: 0n }))).toBeInstanceOf(EmptyAssets);
    expect(catchErr(() => auction.buy(ALICE, { ...base, assetsReceiver: zeroAddress }))).toBeInstanceOf(InvalidRecipient);
    expect(catchErr(() => auction.buy(ALICE, { ...base, deadline: START - 1n, epochId: 3n }))).toBeInstanceOf(
      DeadlinePassed,
    );
    expect(catchErr(() => auction.buy(ALICE, { ...base, epochId: 3n, maxPaymentAmount: 0n }))).toBeInstanceOf(
      EpochIdMismatch,
    );
    expect(catchErr(() => auction.buy(ALICE, { ...base, maxPaymentAmount: E18 - 1n }))).toBeInstanceOf(MaxPriceExceeded);
    expect(auction.epochId).toBe(0n);
  });

  it('takes no payment once the price is zero and resets to the floor', () => {
    const w = world();
    const auction = deployTreasury(w);
    fund(w, w.weth, TREASURY, 42n, TREASURY);

    w.clock.set(START + 3600n);
    const paid = auction.buy(CAROL, {
      assets: [WETH],
      assetsReceiver: CAROL,
      epochId: 0n,
      deadline: FAR,
      maxPaymentAmount: 0n,
    });

    expect(paid).toBe(0n);
    expect(w.weth.balanceOf(CAROL)).toBe(42n);
    expect(auction.epoch().initPrice).toBe(1_000_000n);
  });

  it('rolls back when an asset is unknown', () => {
    const w = world();
    const auction = deployTreasury(w);
    fund(w, w.weth, TREASURY, 5n, TREASURY);

    w.clock.set(START + 3600n);
    expect(() =>
      auction.buy(CAROL, { assets: [WETH, ALICE], assetsReceiver: CAROL, epochId: 0n, deadline: FAR, maxPaymentAmount: 0n }),
    ).toThrow(UnknownAsset);

    expect(auction.epochId).toBe(0n);
    expect(w.weth.balanceOf(TREASURY)).toBe(5n);
  });

  it('rejects a second buyer holding the same epoch id', () => {
    const w = world();
    const auction = deployTreasury(w);

    w.clock.set(START + 3600n);
    const intent = { assets: [WETH], assetsReceiver: BOB, epochId: 0n, deadline: FAR, maxPaymentAmount: 0n };
    auction.buy(BOB, intent);
    expect(() => auction.buy(CAROL, intent)).toThrow(EpochIdMismatch);
  });

  it('auctions off the fees the mining auction routed to it', () => {
    const w = world();
    const mining = deployMining(w);
    const treasury = deployTreasury(w);
    fund(w, w.weth, ALICE, 10n * E18, MINING);
    fund(w, w.lp, BOB, 10n * E18, TREASURY);

    w.clock.set(START + 1800n);
    mining.mine(ALICE, { miner: ALICE, epochId: 0n, deadline: FAR, maxPrice: E18, uri: '' });
    expect(treasury.holdings([WETH]).get(WETH)).toBe(75_000_000_000_000n);

    const paid = treasury.buy(BOB, {
      assets: [WETH],
      assetsReceiver: BOB,
      epochId: 0n,
      deadline: FAR,
      maxPaymentAmount: E18,
    });

    expect(paid).toBe(500_000_000_000_000_000n);
    expect(w.weth.balanceOf(BOB)).toBe(75_000_000_000_000n);
    expect(w.weth.balanceOf(TREASURY)).toBe(0n);
  });

  it('leaves the epoch untouched when a buy fails inside another settle', () => {
    const w = world();
    const mining = deployMining(w);
    const treasury = deployTreasury(w);
    fund(w, w.weth, ALICE, 10n * E18, MINING);

    const buys: Array<TreasuryAuctionEvents['Buy']> = [];
    treasury.on('Buy', (e) => buys.push(e));

    const errors: unknown[] = [];
    w.weth.setTransferHook(() => {
      w.weth.setTransferHook(undefined);
      // CAROL holds no LP, so the payment pull fails after the epoch commit.
      errors.push(
        catchErr(() =>
          treasury.buy(CAROL, { assets: [WETH], assetsReceiver: CAROL, epochId: 0n, deadline: FAR, maxPaymentAmount: E18 }),
        ),
      );
    });

    w.clock.set(START + 1800n);
    mining.mine(ALICE, { miner: ALICE, epochId: 0n, deadline: FAR, maxPrice: E18, uri: '' });

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(InsufficientAllowance);
    expect(mining.epochId).toBe(1n);
    expect(treasury.epoch()).toEqual({ epochId: 0n, initPrice: E18, startTime: START });
    expect(buys).toEqual([]);
    expect(w.weth.balanceOf(CAROL)).toBe(0n);
  });
});

