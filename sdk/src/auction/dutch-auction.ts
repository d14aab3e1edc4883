import type { Address } from 'viem';
import { isAddressEqual, zeroAddress } from 'viem';

import type { LocalChain } from '../chain/local-chain.js';
import type { EventMap, Unsubscribe } from '../chain/emitter.js';
import { TypedEmitter } from '../chain/emitter.js';
import { priceAt } from '../math/price.js';
import {
  ABS_MAX_INIT_PRICE,
  ABS_MIN_INIT_PRICE,
  MAX_EPOCH_PERIOD,
  MAX_PRICE_MULTIPLIER,
  MIN_EPOCH_PERIOD,
  MIN_PRICE_MULTIPLIER,
} from './constants.js';
import { DeadlinePassed, MaxPriceExceeded, OutOfRange, ZeroAddress } from './errors.js';
import type { Epoch } from './epoch.js';
import { EpochLedger, ReentrancyGuard, nextInitPrice } from './epoch.js';

export interface DutchAuctionParams {
  epochPeriod: bigint;
  priceMultiplier: bigint;
  minInitPrice: bigint;
}

export interface SettleIntent {
  epochId: bigint;
  deadline: bigint;
  maxPrice: bigint;
}

export interface SettleContext<E extends Epoch> {
  /** Epoch being closed, as captured at entry. */
  previous: E;
  price: bigint;
  now: bigint;
  /** Fields every auction advances identically. */
  next: Epoch;
}

export interface SettlePlan<E extends Epoch, R> {
  next: E;
  /** External effects; run only after `next` is committed. */
  interact: () => void;
  result: R;
}

export function isZeroAddress(a: Address): boolean {
  return isAddressEqual(a, zeroAddress);
}

export function requireAddress(a: Address, field: string): Address {
  if (isZeroAddress(a)) throw new ZeroAddress(field);
  return a;
}

export function requireInRange(param: string, value: bigint, min: bigint, max: bigint): bigint {
  if (value < min || value > max) throw new OutOfRange(param, value, min, max);
  return value;
}

export function validateDutchParams(p: DutchAuctionParams): void {
  requireInRange('epochPeriod', p.epochPeriod, MIN_EPOCH_PERIOD, MAX_EPOCH_PERIOD);
  requireInRange('priceMultiplier', p.priceMultiplier, MIN_PRICE_MULTIPLIER, MAX_PRICE_MULTIPLIER);
  requireInRange('minInitPrice', p.minInitPrice, ABS_MIN_INIT_PRICE, ABS_MAX_INIT_PRICE);
}

/**
 * Epoch-based Dutch auction shared by the mining and treasury auctions.
 *
 * A settle runs as one chain transaction under a reentrancy guard, in three
 * steps: checks, commit of the next epoch, then the subclass's external
 * effects. Any throw rolls the whole call back.
 */
export abstract class DutchAuction<E extends Epoch, Events extends EventMap> {
  public readonly address: Address;
  public readonly epochPeriod: bigint;
  public readonly priceMultiplier: bigint;
  public readonly minInitPrice: bigint;

  protected readonly chain: LocalChain;
  protected readonly ledger: EpochLedger<E>;
  private readonly guard = new ReentrancyGuard();
  private readonly events = new TypedEmitter<Events>();

  protected constructor(chain: LocalChain, address: Address, params: DutchAuctionParams, genesis: E) {
    this.chain = chain;
    this.address = address;
    this.epochPeriod = params.epochPeriod;
    this.priceMultiplier = params.priceMultiplier;
    this.minInitPrice = params.minInitPrice;
    this.ledger = new EpochLedger(genesis);
    chain.register(this.ledger);
  }

  epoch(): E {
    return this.ledger.current;
  }

  get epochId(): bigint {
    return this.ledger.current.epochId;
  }

  getPrice(): bigint {
    return this.priceAt(this.chain.now());
  }

  priceAt(now: bigint): bigint {
    const e = this.ledger.current;
    return priceAt(e.initPrice, e.startTime, this.epochPeriod, now);
  }

  on<K extends keyof Events>(name: K, handler: (args: Events[K]) => void): Unsubscribe {
    return this.events.on(name, handler);
  }

  protected log<K extends keyof Events>(name: K, args: Events[K]): void {
    this.chain.emitLog(() => this.events.emit(name, args));
  }

  protected settle<R>(intent: SettleIntent, plan: (ctx: SettleContext<E>) => SettlePlan<E, R>): R {
    return this.chain.execute(() =>
      this.guard.run(() => {
        const now = this.chain.now();
        if (now > intent.deadline) throw new DeadlinePassed(intent.deadline, now);

        this.ledger.assertCurrent(intent.epochId);
        const previous = this.ledger.current;

        const price = priceAt(previous.initPrice, previous.startTime, this.epochPeriod, now);
        if (price > intent.maxPrice) throw new MaxPriceExceeded(price, intent.maxPrice);

        const next: Epoch = {
          epochId: previous.epochId + 1n,
          initPrice: nextInitPrice(price, this.priceMultiplier, this.minInitPrice, ABS_MAX_INIT_PRICE),
          startTime: now,
        };

        const p = plan({ previous, price, now, next });
        this.ledger.commit(intent.epochId, p.next);
        p.interact();
        return p.result;
      }),
    );
  }
}
