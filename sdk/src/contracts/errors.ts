import { BaseError, ContractFunctionRevertedError } from 'viem';

import {
  AuctionError,
  DeadlinePassed,
  EmptyAssets,
  EpochIdMismatch,
  InvalidRecipient,
  MaxPriceExceeded,
  ReentrantCall,
  ZeroAddress,
} from '../auction/errors.js';

/**
 * Map an on-chain revert to the matching local error class.
 *
 * Custom errors carry no arguments on-chain, so numeric fields are unknown and
 * reported as -1. Anything that is not a recognised auction revert is returned
 * unchanged.
 */
export function decodeAuctionRevert(err: unknown): unknown {
  if (!(err instanceof BaseError)) return err;

  const reverted = err.walk((e) => e instanceof ContractFunctionRevertedError);
  if (!(reverted instanceof ContractFunctionRevertedError)) return err;

  const decoded = fromErrorName(reverted.data?.errorName);
  if (!decoded) return err;
  decoded.cause = err;
  return decoded;
}

function fromErrorName(name: string | undefined): AuctionError | undefined {
  switch (name) {
    case 'ZeroAddress':
      return new ZeroAddress('unknown');
    case 'InvalidRecipient':
      return new InvalidRecipient('unknown');
    case 'DeadlinePassed':
      return new DeadlinePassed(-1n, -1n);
    case 'EpochIdMismatch':
      return new EpochIdMismatch(-1n, -1n);
    case 'MaxPriceExceeded':
      return new MaxPriceExceeded(-1n, -1n);
    case 'EmptyAssets':
      return new EmptyAssets();
    case 'Reentrancy':
      return new ReentrantCall();
    default:
      return undefined;
  }
}
