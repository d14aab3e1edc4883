import type { Address } from 'viem';

export type AuctionErrorCode =
  | 'ZERO_ADDRESS'
  | 'OUT_OF_RANGE'
  | 'INVALID_RECIPIENT'
  | 'DEADLINE_PASSED'
  | 'EPOCH_ID_MISMATCH'
  | 'MAX_PRICE_EXCEEDED'
  | 'EMPTY_ASSETS'
  | 'REENTRANT_CALL'
  | 'UNKNOWN_ASSET'
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'ZERO_TRANSFER'
  | 'NOT_MINTER';

export class AuctionError extends Error {
  readonly code: AuctionErrorCode;

  constructor(code: AuctionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// ─── Construction-time ─────────────────────────────────────────────────

export class ZeroAddress extends AuctionError {
  readonly field: string;

  constructor(field: string) {
    super('ZERO_ADDRESS', `${field} must not be the zero address`);
    this.field = field;
  }
}

export class OutOfRange extends AuctionError {
  readonly param: string;
  readonly value: bigint;
  readonly min: bigint;
  readonly max: bigint;

  constructor(param: string, value: bigint, min: bigint, max: bigint) {
    super('OUT_OF_RANGE', `${param} out of range (value=${value}, min=${min}, max=${max})`);
    this.param = param;
    this.value = value;
    this.min = min;
    this.max = max;
  }
}

// ─── Call-time ─────────────────────────────────────────────────────────

export class InvalidRecipient extends AuctionError {
  constructor(field: string) {
    super('INVALID_RECIPIENT', `Invalid recipient: ${field} is the zero address`);
  }
}

export class DeadlinePassed extends AuctionError {
  readonly deadline: bigint;
  readonly now: bigint;

  constructor(deadline: bigint, now: bigint) {
    super('DEADLINE_PASSED', `Deadline passed (now=${now}, deadline=${deadline})`);
    this.deadline = deadline;
    this.now = now;
  }
}

export class EpochIdMismatch extends AuctionError {
  readonly expected: bigint;
  readonly actual: bigint;

  constructor(expected: bigint, actual: bigint) {
    super('EPOCH_ID_MISMATCH', `Epoch id mismatch (expected=${expected}, current=${actual})`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class MaxPriceExceeded extends AuctionError {
  readonly price: bigint;
  readonly maxPrice: bigint;

  constructor(price: bigint, maxPrice: bigint) {
    super('MAX_PRICE_EXCEEDED', `Price ${price} exceeds max ${maxPrice}`);
    this.price = price;
    this.maxPrice = maxPrice;
  }
}

export class EmptyAssets extends AuctionError {
  constructor() {
    super('EMPTY_ASSETS', 'Asset list is empty');
  }
}

export class ReentrantCall extends AuctionError {
  constructor() {
    super('REENTRANT_CALL', 'Reentrant call');
  }
}

export class UnknownAsset extends AuctionError {
  readonly asset: Address;

  constructor(asset: Address) {
    super('UNKNOWN_ASSET', `Unknown asset: ${asset}`);
    this.asset = asset;
  }
}

// ─── Token ledger ──────────────────────────────────────────────────────

export class InsufficientBalance extends AuctionError {
  constructor(owner: Address, balance: bigint, needed: bigint) {
    super('INSUFFICIENT_BALANCE', `Insufficient balance for ${owner} (balance=${balance}, needed=${needed})`);
  }
}

export class InsufficientAllowance extends AuctionError {
  constructor(owner: Address, spender: Address, allowance: bigint, needed: bigint) {
    super(
      'INSUFFICIENT_ALLOWANCE',
      `Insufficient allowance ${owner} -> ${spender} (allowance=${allowance}, needed=${needed})`,
    );
  }
}

export class ZeroTransfer extends AuctionError {
  constructor() {
    super('ZERO_TRANSFER', 'Zero-amount transfer rejected');
  }
}

export class NotMinter extends AuctionError {
  constructor(caller: Address) {
    super('NOT_MINTER', `${caller} is not the minter`);
  }
}
