import { EventEmitter } from 'node:events';

import type { Account, Address, Hex, PublicClient, TransactionReceipt, WalletClient } from 'viem';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isTransientError(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  return (
    msg.includes('timeout') ||
    msg.includes('ECONNRESET') ||
    msg.includes('ETIMEDOUT') ||
    msg.includes('429') ||
    msg.toLowerCase().includes('rate limit')
  );
}

function isNonceError(err: unknown): boolean {
  const msg = err instanceof Error ? err.message.toLowerCase() : String(err).toLowerCase();
  return msg.includes('nonce') || msg.includes('replacement transaction underpriced');
}

class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((r) => (release = r));
    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class TransactionRevertedError extends Error {
  public readonly hash: Hex;

  constructor(hash: Hex) {
    super(`TxSubmitter: transaction ${hash} reverted`);
    this.name = 'TransactionRevertedError';
    this.hash = hash;
  }
}

export type TxRequest = {
  account: Account;
  to: Address;
  data: Hex;
  gas?: bigint;
};

export type TxSubmitterOptions = {
  maxGas?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  confirmations?: number;
  retries?: number;
  backoffMs?: { base: number; max: number };
};

export type TxSentEvent = { hash: Hex; nonce: number; to: Address };
export type TxConfirmedEvent = { hash: Hex; receipt: TransactionReceipt };
export type TxFailedEvent = { error: unknown };

type TxEvents = {
  txSent: TxSentEvent;
  txConfirmed: TxConfirmedEvent;
  txFailed: TxFailedEvent;
};

/** Serialises nonces per sender, retries transient failures and waits for the receipt. */
export class TxSubmitter {
  private readonly publicClient: PublicClient;
  private readonly walletClient: WalletClient;
  private readonly opts: Required<TxSubmitterOptions>;

  private readonly emitter = new EventEmitter();

  private readonly nonceMutexByFrom = new Map<Address, Mutex>();
  private readonly nextNonceByFrom = new Map<Address, number>();

  constructor(args: { publicClient: PublicClient; walletClient: WalletClient; opts?: TxSubmitterOptions }) {
    this.publicClient = args.publicClient;
    this.walletClient = args.walletClient;
    this.opts = {
      maxGas: args.opts?.maxGas ?? 1_500_000n,
      maxFeePerGas: args.opts?.maxFeePerGas ?? 0n,
      maxPriorityFeePerGas: args.opts?.maxPriorityFeePerGas ?? 0n,
      confirmations: args.opts?.confirmations ?? 1,
      retries: args.opts?.retries ?? 3,
      backoffMs: args.opts?.backoffMs ?? { base: 250, max: 5_000 },
    };
  }

  on<K extends keyof TxEvents>(event: K, handler: (e: TxEvents[K]) => void): () => void {
    this.emitter.on(event, handler);
    return () => this.emitter.off(event, handler);
  }

  private emit<K extends keyof TxEvents>(event: K, payload: TxEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  async submit(request: TxRequest): Promise<Hex> {
    const from = request.account.address;

    const mutex = this.nonceMutexByFrom.get(from) ?? new Mutex();
    this.nonceMutexByFrom.set(from, mutex);

    const sendOnce = (): Promise<Hex> =>
      mutex.runExclusive(async () => {
        let nonce = this.nextNonceByFrom.get(from);
        if (nonce == null) {
          nonce = await this.publicClient.getTransactionCount({ address: from, blockTag: 'pending' });
        }
        this.nextNonceByFrom.set(from, nonce + 1);

        try {
          const gas = await this.resolveGas(request);
          const hash = await this.walletClient.sendTransaction({
            account: request.account,
            chain: this.walletClient.chain ?? null,
            to: request.to,
            data: request.data,
            nonce,
            gas,
            maxFeePerGas: this.opts.maxFeePerGas > 0n ? this.opts.maxFeePerGas : undefined,
            maxPriorityFeePerGas: this.opts.maxPriorityFeePerGas > 0n ? this.opts.maxPriorityFeePerGas : undefined,
          });
          this.emit('txSent', { hash, nonce, to: request.to });
          return hash;
        } catch (err) {
          if (isNonceError(err)) {
            // Refresh from chain on the retry.
            this.nextNonceByFrom.delete(from);
          } else {
            // Nothing was broadcast; release the nonce.
            this.nextNonceByFrom.set(from, nonce);
          }
          throw err;
        }
      });

    let attempt = 0;
    while (true) {
      attempt++;
      try {
        const hash = await sendOnce();

        // Confirm outside the nonce mutex.
        const receipt = await this.publicClient.waitForTransactionReceipt({
          hash,
          confirmations: this.opts.confirmations,
        });
        if (receipt.status === 'reverted') throw new TransactionRevertedError(hash);

        this.emit('txConfirmed', { hash, receipt });
        return hash;
      } catch (err) {
        if (attempt >= this.opts.retries + 1 || (!isTransientError(err) && !isNonceError(err))) {
          this.emit('txFailed', { error: err });
          throw err;
        }

        const backoff = Math.min(this.opts.backoffMs.base * 2 ** (attempt - 1), this.opts.backoffMs.max);
        await sleep(backoff);
      }
    }
  }

  private async resolveGas(request: TxRequest): Promise<bigint> {
    const gas =
      request.gas ??
      (await this.publicClient.estimateGas({ account: request.account, to: request.to, data: request.data }));
    return gas > this.opts.maxGas ? this.opts.maxGas : gas;
  }
}
