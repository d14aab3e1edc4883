import type { Participant } from '../chain/participant.js';
import { clamp, wadMul } from '../math/wad.js';
import { EpochIdMismatch, ReentrantCall } from './errors.js';

export interface Epoch {
  readonly epochId: bigint;
  readonly initPrice: bigint;
  readonly startTime: bigint;
}

/**
 * Owns the live epoch of one auction. The epoch is replaced whole, only through
 * `commit`, and only by its direct successor.
 */
export class EpochLedger<E extends Epoch> implements Participant {
  private epoch: E;

  constructor(genesis: E) {
    if (genesis.epochId !== 0n) throw new Error('EpochLedger: genesis epochId must be 0');
    Object.freeze(genesis);
    this.epoch = genesis;
  }

  get current(): E {
    return this.epoch;
  }

  assertCurrent(expectedEpochId: bigint): void {
    if (expectedEpochId !== this.epoch.epochId) throw new EpochIdMismatch(expectedEpochId, this.epoch.epochId);
  }

  commit(expectedEpochId: bigint, next: E): E {
    this.assertCurrent(expectedEpochId);
    if (next.epochId !== this.epoch.epochId + 1n) {
      throw new Error(`EpochLedger: next epochId must be ${this.epoch.epochId + 1n} (got ${next.epochId})`);
    }
    Object.freeze(next);
    this.epoch = next;
    return next;
  }

  checkpoint(): () => void {
    const saved = this.epoch;
    return () => {
      this.epoch = saved;
    };
  }
}

export function nextInitPrice(
  paidPrice: bigint,
  priceMultiplier: bigint,
  minInitPrice: bigint,
  maxInitPrice: bigint,
): bigint {
  return clamp(wadMul(paidPrice, priceMultiplier), minInitPrice, maxInitPrice);
}

export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(fn: () => T): T {
    if (this.entered) throw new ReentrantCall();
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
