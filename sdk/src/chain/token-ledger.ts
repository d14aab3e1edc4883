import type { Address } from 'viem';
import { isAddressEqual, zeroAddress } from 'viem';

import {
  InsufficientAllowance,
  InsufficientBalance,
  InvalidRecipient,
  NotMinter,
  ZeroTransfer,
} from '../auction/errors.js';
import type { Participant } from './participant.js';

export type TokenTransfer = {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
};

export type TransferHook = (transfer: TokenTransfer) => void;

export type TokenLedgerOptions = {
  symbol?: string;
  minter?: Address;
  /** Some tokens revert on zero-amount transfers; callers must skip them. */
  rejectZeroTransfers?: boolean;
  /** Runs after every balance move, like a receiver callback on hook-bearing tokens. */
  onTransfer?: TransferHook;
};

type LedgerState = {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
  supply: bigint;
};

function key(a: Address): string {
  return a.toLowerCase();
}

function pairKey(owner: Address, spender: Address): string {
  return `${key(owner)}:${key(spender)}`;
}

/** Minimal fungible token ledger. Mint is restricted to a single minter. */
export class TokenLedger implements Participant {
  public readonly address: Address;
  public readonly symbol: string;
  public readonly rejectZeroTransfers: boolean;

  private minterAddress?: Address;
  private hook?: TransferHook;
  private state: LedgerState = { balances: new Map(), allowances: new Map(), supply: 0n };

  constructor(address: Address, opts: TokenLedgerOptions = {}) {
    this.address = address;
    this.symbol = opts.symbol ?? 'TOKEN';
    this.minterAddress = opts.minter;
    this.rejectZeroTransfers = opts.rejectZeroTransfers ?? false;
    this.hook = opts.onTransfer;
  }

  get minter(): Address | undefined {
    return this.minterAddress;
  }

  setMinter(minter: Address): void {
    if (this.minterAddress) throw new Error(`TokenLedger(${this.symbol}): minter already set`);
    this.minterAddress = minter;
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this.hook = hook;
  }

  balanceOf(owner: Address): bigint {
    return this.state.balances.get(key(owner)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(pairKey(owner, spender)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.state.supply;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    if (amount < 0n) throw new RangeError('amount must be >= 0');
    this.state.allowances.set(pairKey(owner, spender), amount);
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    if (!this.minterAddress || !isAddressEqual(caller, this.minterAddress)) throw new NotMinter(caller);
    if (isAddressEqual(to, zeroAddress)) throw new InvalidRecipient('to');
    if (amount < 0n) throw new RangeError('amount must be >= 0');

    this.state.balances.set(key(to), this.balanceOf(to) + amount);
    this.state.supply += amount;
    this.hook?.({ token: this.address, from: zeroAddress, to, amount });
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.checkTransfer(from, to, amount);
    this.move(from, to, amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) throw new InsufficientAllowance(from, spender, allowed, amount);
    this.checkTransfer(from, to, amount);

    this.state.allowances.set(pairKey(from, spender), allowed - amount);
    this.move(from, to, amount);
  }

  private checkTransfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) throw new RangeError('amount must be >= 0');
    if (amount === 0n && this.rejectZeroTransfers) throw new ZeroTransfer();
    if (isAddressEqual(to, zeroAddress)) throw new InvalidRecipient('to');

    const balance = this.balanceOf(from);
    if (balance < amount) throw new InsufficientBalance(from, balance, amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.state.balances.set(key(from), this.balanceOf(from) - amount);
    this.state.balances.set(key(to), this.balanceOf(to) + amount);
    this.hook?.({ token: this.address, from, to, amount });
  }

  checkpoint(): () => void {
    const saved: LedgerState = {
      balances: new Map(this.state.balances),
      allowances: new Map(this.state.allowances),
      supply: this.state.supply,
    };
    return () => {
      this.state = saved;
    };
  }
}
