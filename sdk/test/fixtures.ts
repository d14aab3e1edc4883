import type { Address } from 'viem';
import { zeroAddress } from 'viem';

import { LocalChain } from '../src/chain/local-chain.js';
import { ManualClock } from '../src/chain/clock.js';
import { StaticFeeSource } from '../src/chain/fee-source.js';
import type { TokenLedger } from '../src/chain/token-ledger.js';
import type { MiningAuctionConfig } from '../src/auction/mining-auction.js';
import { MiningAuction } from '../src/auction/mining-auction.js';
import type { TreasuryAuctionConfig } from '../src/auction/treasury-auction.js';
import { TreasuryAuction } from '../src/auction/treasury-auction.js';

export const ALICE: Address = '0x1111111111111111111111111111111111111111';
export const BOB: Address = '0x2222222222222222222222222222222222222222';
export const CAROL: Address = '0x3333333333333333333333333333333333333333';
export const LAUNCHER: Address = '0x4444444444444444444444444444444444444444';
export const TEAM: Address = '0x7777777777777777777777777777777777777777';
export const PROTOCOL: Address = '0x8888888888888888888888888888888888888888';
export const TREASURY: Address = '0x9999999999999999999999999999999999999999';
export const MINING: Address = '0xa0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0';
export const UNIT: Address = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
export const WETH: Address = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';
export const FEE_SOURCE: Address = '0xcccccccccccccccccccccccccccccccccccccccc';
export const LP: Address = '0xdddddddddddddddddddddddddddddddddddddddd';
export const OTHER_ASSET: Address = '0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee';
export const BURN: Address = '0x000000000000000000000000000000000000dead';
export const ZERO: Address = zeroAddress;

export const START = 1_700_000_000n;
export const E18 = 10n ** 18n;
export const YEAR = 365n * 24n * 60n * 60n;

export type World = {
  clock: ManualClock;
  chain: LocalChain;
  unit: TokenLedger;
  weth: TokenLedger;
  lp: TokenLedger;
  other: TokenLedger;
  feeSource: StaticFeeSource;
};

export function world(opts: { protocol?: Address } = {}): World {
  const clock = new ManualClock(START);
  const chain = new LocalChain(clock);
  const unit = chain.createToken(UNIT, { symbol: 'UNIT', minter: MINING });
  const weth = chain.createToken(WETH, { symbol: 'WETH' });
  const lp = chain.createToken(LP, { symbol: 'LP' });
  const other = chain.createToken(OTHER_ASSET, { symbol: 'OTHER', rejectZeroTransfers: true });
  const feeSource = new StaticFeeSource(FEE_SOURCE, opts.protocol ?? PROTOCOL);
  return { clock, chain, unit, weth, lp, other, feeSource };
}

export function miningConfig(w: World, overrides: Partial<MiningAuctionConfig> = {}): MiningAuctionConfig {
  return {
    address: MINING,
    unitToken: UNIT,
    paymentToken: WETH,
    treasury: TREASURY,
    team: TEAM,
    feeSource: w.feeSource,
    initialHolder: LAUNCHER,
    uri: 'genesis',
    initialRate: E18,
    tailRate: 10n ** 16n,
    halvingPeriod: YEAR,
    epochPeriod: 3600n,
    priceMultiplier: 2n * E18,
    minInitPrice: 10n ** 15n,
    ...overrides,
  };
}

export function treasuryConfig(overrides: Partial<TreasuryAuctionConfig> = {}): TreasuryAuctionConfig {
  return {
    address: TREASURY,
    paymentToken: LP,
    paymentReceiver: BURN,
    initPrice: E18,
    epochPeriod: 3600n,
    priceMultiplier: 1_200_000_000_000_000_000n,
    minInitPrice: 1_000_000n,
    ...overrides,
  };
}

export function deployMining(w: World, overrides: Partial<MiningAuctionConfig> = {}): MiningAuction {
  return new MiningAuction(w.chain, miningConfig(w, overrides));
}

export function deployTreasury(w: World, overrides: Partial<TreasuryAuctionConfig> = {}): TreasuryAuction {
  return new TreasuryAuction(w.chain, treasuryConfig(overrides));
}

/** Seed `who` with `amount` of `token` and approve `spender` for all of it. */
export function fund(w: World, token: TokenLedger, who: Address, amount: bigint, spender: Address): void {
  const faucet: Address = '0xfafafafafafafafafafafafafafafafafafafafa';
  if (!w.chain.hasToken(token.address)) throw new Error('fund: unknown token');
  const minter = token.minter ?? faucet;
  if (!token.minter) token.setMinter(faucet);
  token.mint(minter, who, amount);
  token.approve(who, spender, amount);
}
