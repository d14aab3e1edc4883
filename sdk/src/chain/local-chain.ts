import type { Address } from 'viem';

import { UnknownAsset } from '../auction/errors.js';
import type { Clock } from './clock.js';
import type { Participant } from './participant.js';
import { TokenLedger } from './token-ledger.js';
import type { TokenLedgerOptions } from './token-ledger.js';

/**
 * In-process execution environment for the auctions.
 *
 * `execute` gives a call all-or-nothing semantics: every registered participant
 * is checkpointed first and restored if the call throws. Logs raised during the
 * call are held back and delivered only once it has completed.
 */
export class LocalChain {
  public readonly clock: Clock;

  private readonly participants: Participant[] = [];
  private readonly tokens = new Map<string, TokenLedger>();
  private pendingLogs?: Array<() => void>;
  private txCount = 0;

  constructor(clock: Clock) {
    this.clock = clock;
  }

  now(): bigint {
    return this.clock.now();
  }

  get transactions(): number {
    return this.txCount;
  }

  register(p: Participant): void {
    this.participants.push(p);
  }

  createToken(address: Address, opts?: TokenLedgerOptions): TokenLedger {
    if (this.tokens.has(address.toLowerCase())) throw new Error(`LocalChain: token already exists at ${address}`);
    const token = new TokenLedger(address, opts);
    this.tokens.set(address.toLowerCase(), token);
    this.register(token);
    return token;
  }

  token(address: Address): TokenLedger {
    const t = this.tokens.get(address.toLowerCase());
    if (!t) throw new UnknownAsset(address);
    return t;
  }

  hasToken(address: Address): boolean {
    return this.tokens.has(address.toLowerCase());
  }

  /**
   * Run `fn` as one transaction. A nested call runs inside the enclosing
   * transaction; if it throws, its own writes and logs are undone even when the
   * caller catches the error.
   */
  execute<T>(fn: () => T): T {
    if (this.pendingLogs) return this.nested(this.pendingLogs, fn);

    const restores = this.participants.map((p) => p.checkpoint());
    this.pendingLogs = [];

    let result: T;
    try {
      result = fn();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      this.pendingLogs = undefined;
      throw err;
    }

    const logs = this.pendingLogs;
    this.pendingLogs = undefined;
    this.txCount++;
    for (const deliver of logs) deliver();
    return result;
  }

  private nested<T>(logs: Array<() => void>, fn: () => T): T {
    const restores = this.participants.map((p) => p.checkpoint());
    const mark = logs.length;

    try {
      return fn();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      logs.length = mark;
      throw err;
    }
  }

  /** Queue a log for delivery when the current transaction completes. */
  emitLog(deliver: () => void): void {
    if (this.pendingLogs) this.pendingLogs.push(deliver);
    else deliver();
  }
}
