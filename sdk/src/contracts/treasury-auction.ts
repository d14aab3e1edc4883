import type { Account, Address, PublicClient } from 'viem';
import { encodeFunctionData } from 'viem';

import type { BuyIntent } from '../auction/treasury-auction.js';
import { TREASURY_AUCTION_ABI } from './abi.js';
import { decodeAuctionRevert } from './errors.js';
import type { PreparedCall } from './mining-auction.js';

export type TreasuryEpochView = {
  epochId: bigint;
  initPrice: bigint;
  startTime: bigint;
};

export type TreasuryAuctionState = {
  blockNumber: bigint;
  timestamp: bigint;
  epoch: TreasuryEpochView;
  price: bigint;
  epochPeriod: bigint;
};

export class TreasuryAuctionContract {
  public readonly address: Address;
  private readonly client: PublicClient;

  constructor(address: Address, client: PublicClient) {
    this.address = address;
    this.client = client;
  }

  async getPrice(blockNumber?: bigint): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: TREASURY_AUCTION_ABI, functionName: 'getPrice', blockNumber });
  }

  async epochPeriod(): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: TREASURY_AUCTION_ABI, functionName: 'epochPeriod' });
  }

  async paymentToken(): Promise<Address> {
    return this.client.readContract({ address: this.address, abi: TREASURY_AUCTION_ABI, functionName: 'paymentToken' });
  }

  async getEpoch(blockNumber?: bigint): Promise<TreasuryEpochView> {
    const e = await this.client.readContract({
      address: this.address,
      abi: TREASURY_AUCTION_ABI,
      functionName: 'getEpoch',
      blockNumber,
    });
    return { epochId: e.epochId, initPrice: e.initPrice, startTime: e.startTime };
  }

  async readState(): Promise<TreasuryAuctionState> {
    const block = await this.client.getBlock({ blockTag: 'latest' });
    const blockNumber = block.number;
    const [epoch, price, epochPeriod] = await Promise.all([
      this.getEpoch(blockNumber),
      this.getPrice(blockNumber),
      this.epochPeriod(),
    ]);
    return { blockNumber, timestamp: block.timestamp, epoch, price, epochPeriod };
  }

  async simulateBuy(account: Account | Address, intent: BuyIntent): Promise<bigint> {
    try {
      const { result } = await this.client.simulateContract({
        address: this.address,
        abi: TREASURY_AUCTION_ABI,
        functionName: 'buy',
        args: [[...intent.assets], intent.assetsReceiver, intent.epochId, intent.deadline, intent.maxPaymentAmount],
        account,
      });
      return result;
    } catch (err) {
      throw decodeAuctionRevert(err);
    }
  }

  encodeBuy(intent: BuyIntent): PreparedCall {
    return {
      to: this.address,
      data: encodeFunctionData({
        abi: TREASURY_AUCTION_ABI,
        functionName: 'buy',
        args: [[...intent.assets], intent.assetsReceiver, intent.epochId, intent.deadline, intent.maxPaymentAmount],
      }),
    };
  }
}
