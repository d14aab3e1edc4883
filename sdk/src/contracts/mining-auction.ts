import type { Account, Address, Hex, PublicClient } from 'viem';
import { encodeFunctionData } from 'viem';

import type { MineIntent } from '../auction/mining-auction.js';
import { MINING_AUCTION_ABI } from './abi.js';
import { decodeAuctionRevert } from './errors.js';

export type PreparedCall = { to: Address; data: Hex };

export type MiningEpochView = {
  epochId: bigint;
  initPrice: bigint;
  startTime: bigint;
  rate: bigint;
  holder: Address;
  uri: string;
};

export type MiningAuctionState = {
  blockNumber: bigint;
  timestamp: bigint;
  epoch: MiningEpochView;
  price: bigint;
  rate: bigint;
  epochPeriod: bigint;
};

export class MiningAuctionContract {
  public readonly address: Address;
  private readonly client: PublicClient;

  constructor(address: Address, client: PublicClient) {
    this.address = address;
    this.client = client;
  }

  async getPrice(blockNumber?: bigint): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: MINING_AUCTION_ABI, functionName: 'getPrice', blockNumber });
  }

  async getRate(blockNumber?: bigint): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: MINING_AUCTION_ABI, functionName: 'getRate', blockNumber });
  }

  async epochPeriod(): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: MINING_AUCTION_ABI, functionName: 'epochPeriod' });
  }

  async getEpoch(blockNumber?: bigint): Promise<MiningEpochView> {
    const e = await this.client.readContract({
      address: this.address,
      abi: MINING_AUCTION_ABI,
      functionName: 'getEpoch',
      blockNumber,
    });
    return {
      epochId: e.epochId,
      initPrice: e.initPrice,
      startTime: e.startTime,
      rate: e.rate,
      holder: e.holder,
      uri: e.uri,
    };
  }

  /** Price, rate and epoch read at a single block. */
  async readState(): Promise<MiningAuctionState> {
    const block = await this.client.getBlock({ blockTag: 'latest' });
    const blockNumber = block.number;
    const [epoch, price, rate, epochPeriod] = await Promise.all([
      this.getEpoch(blockNumber),
      this.getPrice(blockNumber),
      this.getRate(blockNumber),
      this.epochPeriod(),
    ]);
    return { blockNumber, timestamp: block.timestamp, epoch, price, rate, epochPeriod };
  }

  async simulateMine(account: Account | Address, intent: MineIntent): Promise<bigint> {
    try {
      const { result } = await this.client.simulateContract({
        address: this.address,
        abi: MINING_AUCTION_ABI,
        functionName: 'mine',
        args: [intent.miner, intent.epochId, intent.deadline, intent.maxPrice, intent.uri],
        account,
      });
      return result;
    } catch (err) {
      throw decodeAuctionRevert(err);
    }
  }

  encodeMine(intent: MineIntent): PreparedCall {
    return {
      to: this.address,
      data: encodeFunctionData({
        abi: MINING_AUCTION_ABI,
        functionName: 'mine',
        args: [intent.miner, intent.epochId, intent.deadline, intent.maxPrice, intent.uri],
      }),
    };
  }
}
