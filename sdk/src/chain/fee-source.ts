import type { Address } from 'viem';

/** Registry the mining auction asks for the current protocol fee receiver. */
export interface ProtocolFeeSource {
  readonly address: Address;
  protocolFeeReceiver(): Address;
}

export class StaticFeeSource implements ProtocolFeeSource {
  public readonly address: Address;
  private readonly receiver: Address;

  constructor(address: Address, receiver: Address) {
    this.address = address;
    this.receiver = receiver;
  }

  protocolFeeReceiver(): Address {
    return this.receiver;
  }
}
