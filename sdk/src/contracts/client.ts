import type { Address, PublicClient } from 'viem';

import type { DutchmineDeployment } from '../types/config.js';
import { ERC20Contract } from './erc20.js';
import { MiningAuctionContract } from './mining-auction.js';
import { TreasuryAuctionContract } from './treasury-auction.js';

export class DutchmineClient {
  public readonly deployment: DutchmineDeployment;

  public readonly mining_auction: MiningAuctionContract;
  public readonly treasury_auction: TreasuryAuctionContract;
  public readonly unit_token: ERC20Contract;
  public readonly payment_token: ERC20Contract;

  private readonly client: PublicClient;

  constructor(deployment: DutchmineDeployment, client: PublicClient) {
    this.deployment = deployment;
    this.client = client;

    this.mining_auction = new MiningAuctionContract(deployment.mining_auction, client);
    this.treasury_auction = new TreasuryAuctionContract(deployment.treasury_auction, client);
    this.unit_token = new ERC20Contract(deployment.unit_token, client);
    this.payment_token = new ERC20Contract(deployment.payment_token, client);
  }

  erc20(address: Address): ERC20Contract {
    return new ERC20Contract(address, this.client);
  }
}
