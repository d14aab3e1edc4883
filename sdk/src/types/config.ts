import type { Address } from 'viem';

export interface DutchmineDeployment {
  chain_id: bigint;
  mining_auction: Address;
  treasury_auction: Address;
  unit_token: Address;
  payment_token: Address;
}
