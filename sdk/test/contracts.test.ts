import { describe, expect, it } from 'vitest';

import type { Address, PublicClient } from 'viem';
import { ContractFunctionRevertedError, decodeFunctionData, encodeErrorResult, getAddress } from 'viem';

import { EpochIdMismatch, MaxPriceExceeded } from '../src/auction/errors.js';
import { MINING_AUCTION_ABI, TREASURY_AUCTION_ABI } from '../src/contracts/abi.js';
import { DutchmineClient } from '../src/contracts/client.js';
import { decodeAuctionRevert } from '../src/contracts/errors.js';

const MINING: Address = '0xa0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0a0';
const TREASURY: Address = '0x9999999999999999999999999999999999999999';
const UNIT: Address = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const WETH: Address = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';
const ALICE: Address = '0x1111111111111111111111111111111111111111';

type ReadArgs = { address: Address; functionName: string; blockNumber?: bigint; args?: readonly unknown[] };

function fakeClient(overrides: { simulateContract?: () => Promise<unknown> } = {}) {
  const reads: ReadArgs[] = [];
  const client = {
    getBlock: async () => ({ number: 42n, timestamp: 1_700_000_100n }),
    readContract: async (args: ReadArgs) => {
      reads.push(args);
      switch (args.functionName) {
        case 'getPrice':
          return args.address === MINING ? 5_000n : 9_000n;
        case 'getRate':
          return 77n;
        case 'epochPeriod':
          return 3600n;
        case 'getEpoch':
          return args.address === MINING
            ? { epochId: 3n, initPrice: 10_000n, startTime: 1_700_000_000n, rate: 80n, holder: ALICE, uri: 'hi' }
            : { epochId: 8n, initPrice: 20_000n, startTime: 1_699_999_000n };
        case 'balanceOf':
          return 123n;
        default:
          throw new Error(`unexpected read ${args.functionName}`);
      }
    },
    simulateContract: overrides.simulateContract ?? (async () => ({ result: 5_000n, request: {} })),
  };
  return { client: client as unknown as PublicClient, reads };
}

const deployment = {
  chain_id: 8453n,
  mining_auction: MINING,
  treasury_auction: TREASURY,
  unit_token: UNIT,
  payment_token: WETH,
};

describe('MiningAuctionContract', () => {
  it('reads epoch, price and rate at one block', async () => {
    const { client, reads } = fakeClient();
    const sdk = new DutchmineClient(deployment, client);

    const state = await sdk.mining_auction.readState();

    expect(state).toEqual({
      blockNumber: 42n,
      timestamp: 1_700_000_100n,
      epoch: { epochId: 3n, initPrice: 10_000n, startTime: 1_700_000_000n, rate: 80n, holder: ALICE, uri: 'hi' },
      price: 5_000n,
      rate: 77n,
      epochPeriod: 3600n,
    });
    const pinned = reads.filter((r) => r.functionName !== 'epochPeriod');
    expect(pinned.every((r) => r.blockNumber === 42n)).toBe(true);
  });

  it('encodes mine calldata for the auction address', () => {
    const { client } = fakeClient();
    const sdk = new DutchmineClient(deployment, client);

    const call = sdk.mining_auction.encodeMine({ miner: ALICE, epochId: 3n, deadline: 99n, maxPrice: 5_000n, uri: 'x' });
    expect(call.to).toBe(MINING);

    const decoded = decodeFunctionData({ abi: MINING_AUCTION_ABI, data: call.data });
    expect(decoded.functionName).toBe('mine');
    expect(decoded.args).toEqual([ALICE, 3n, 99n, 5_000n, 'x']);
  });

  it('maps a simulated revert to the local error class', async () => {
    const data = encodeErrorResult({ abi: MINING_AUCTION_ABI, errorName: 'EpochIdMismatch' });
    const { client } = fakeClient({
      simulateContract: async () => {
        throw new ContractFunctionRevertedError({ abi: MINING_AUCTION_ABI, data, functionName: 'mine' });
      },
    });
    const sdk = new DutchmineClient(deployment, client);

    await expect(
      sdk.mining_auction.simulateMine(ALICE, { miner: ALICE, epochId: 2n, deadline: 99n, maxPrice: 1n, uri: '' }),
    ).rejects.toBeInstanceOf(EpochIdMismatch);
  });
});

describe('TreasuryAuctionContract', () => {
  it('reads state and encodes buy calldata', async () => {
    const { client } = fakeClient();
    const sdk = new DutchmineClient(deployment, client);

    const state = await sdk.treasury_auction.readState();
    expect(state.epoch).toEqual({ epochId: 8n, initPrice: 20_000n, startTime: 1_699_999_000n });
    expect(state.price).toBe(9_000n);

    const call = sdk.treasury_auction.encodeBuy({
      assets: [WETH],
      assetsReceiver: ALICE,
      epochId: 8n,
      deadline: 100n,
      maxPaymentAmount: 9_000n,
    });
    const decoded = decodeFunctionData({ abi: TREASURY_AUCTION_ABI, data: call.data });
    // Decoded addresses come back checksummed.
    expect(decoded.args).toEqual([[getAddress(WETH)], ALICE, 8n, 100n, 9_000n]);
  });

  it('returns the simulated payment amount', async () => {
    const { client } = fakeClient({ simulateContract: async () => ({ result: 9_000n, request: {} }) });
    const sdk = new DutchmineClient(deployment, client);
    const paid = await sdk.treasury_auction.simulateBuy(ALICE, {
      assets: [WETH],
      assetsReceiver: ALICE,
      epochId: 8n,
      deadline: 100n,
      maxPaymentAmount: 9_000n,
    });
    expect(paid).toBe(9_000n);
  });
});

describe('decodeAuctionRevert', () => {
  it('decodes known custom errors and passes others through', () => {
    const data = encodeErrorResult({ abi: TREASURY_AUCTION_ABI, errorName: 'MaxPriceExceeded' });
    const reverted = new ContractFunctionRevertedError({ abi: TREASURY_AUCTION_ABI, data, functionName: 'buy' });
    const decoded = decodeAuctionRevert(reverted);
    expect(decoded).toBeInstanceOf(MaxPriceExceeded);
    expect(decoded).toMatchObject({ code: 'MAX_PRICE_EXCEEDED' });

    const plain = new Error('network down');
    expect(decodeAuctionRevert(plain)).toBe(plain);
  });

  it('reads ERC20 balances through the client', async () => {
    const { client, reads } = fakeClient();
    const sdk = new DutchmineClient(deployment, client);
    expect(await sdk.erc20(WETH).balanceOf(TREASURY)).toBe(123n);
    expect(reads[0]).toMatchObject({ address: WETH, functionName: 'balanceOf', args: [TREASURY] });
  });

  it('reads the epoch holder\'s unit balance through unit_token', async () => {
    const { client, reads } = fakeClient();
    const sdk = new DutchmineClient(deployment, client);
    const state = await sdk.mining_auction.readState();

    expect(await sdk.unit_token.balanceOf(state.epoch.holder)).toBe(123n);
    expect(reads.at(-1)).toMatchObject({ address: UNIT, functionName: 'balanceOf', args: [ALICE] });
  });
});
