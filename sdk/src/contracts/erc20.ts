import type { Address, PublicClient } from 'viem';
import { encodeFunctionData } from 'viem';

import { ERC20_ABI } from './abi.js';
import type { PreparedCall } from './mining-auction.js';

export class ERC20Contract {
  public readonly address: Address;
  private readonly client: PublicClient;

  constructor(address: Address, client: PublicClient) {
    this.address = address;
    this.client = client;
  }

  async balanceOf(owner: Address): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: ERC20_ABI, functionName: 'balanceOf', args: [owner] });
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: ERC20_ABI,
      functionName: 'allowance',
      args: [owner, spender],
    });
  }

  encodeApprove(spender: Address, amount: bigint): PreparedCall {
    return {
      to: this.address,
      data: encodeFunctionData({ abi: ERC20_ABI, functionName: 'approve', args: [spender, amount] }),
    };
  }
}
