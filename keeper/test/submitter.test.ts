import { describe, expect, it, vi } from 'vitest';

import type { Hex, PublicClient, WalletClient } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

import { TransactionRevertedError, TxSubmitter } from '../src/chain/submitter.js';

const account = privateKeyToAccount(`0x${'02'.repeat(32)}`);
const TO = '0x00000000000000000000000000000000000000a1';

type SentTx = { nonce: number; gas: bigint; to: string; data: Hex };

function fakes(opts: { send?: (tx: SentTx) => Promise<Hex>; status?: 'success' | 'reverted' } = {}) {
  const sent: SentTx[] = [];
  let counter = 0;

  const publicClient = {
    getTransactionCount: vi.fn(async () => 5),
    estimateGas: vi.fn(async () => 2_000_000n),
    waitForTransactionReceipt: vi.fn(async ({ hash }: { hash: Hex }) => ({ transactionHash: hash, status: opts.status ?? 'success' })),
  };

  const walletClient = {
    chain: undefined,
    sendTransaction: vi.fn(async (tx: SentTx) => {
      sent.push(tx);
      if (opts.send) return opts.send(tx);
      counter++;
      return `0x${counter.toString(16).padStart(64, '0')}` as Hex;
    }),
  };

  const submitter = new TxSubmitter({
    publicClient: publicClient as unknown as PublicClient,
    walletClient: walletClient as unknown as WalletClient,
    opts: { backoffMs: { base: 1, max: 2 } },
  });

  return { submitter, publicClient, walletClient, sent };
}

describe('TxSubmitter', () => {
  it('assigns sequential nonces and caps estimated gas', async () => {
    const { submitter, publicClient, sent } = fakes();
    const confirmed: Hex[] = [];
    submitter.on('txConfirmed', (e) => confirmed.push(e.hash));

    const h1 = await submitter.submit({ account, to: TO, data: '0x01' });
    const h2 = await submitter.submit({ account, to: TO, data: '0x02', gas: 21_000n });

    expect(sent.map((t) => t.nonce)).toEqual([5, 6]);
    expect(sent.map((t) => t.gas)).toEqual([1_500_000n, 21_000n]);
    expect(publicClient.getTransactionCount).toHaveBeenCalledTimes(1);
    expect(publicClient.estimateGas).toHaveBeenCalledTimes(1);
    expect(confirmed).toEqual([h1, h2]);
  });

  it('retries transient failures with the same nonce', async () => {
    let calls = 0;
    const { submitter, sent } = fakes({
      send: async () => {
        calls++;
        if (calls === 1) throw new Error('request timeout');
        return `0x${'ab'.repeat(32)}`;
      },
    });

    await expect(submitter.submit({ account, to: TO, data: '0x01' })).resolves.toBe(`0x${'ab'.repeat(32)}`);
    expect(sent.map((t) => t.nonce)).toEqual([5, 5]);
  });

  it('does not retry other errors', async () => {
    const { submitter, walletClient } = fakes({
      send: async () => {
        throw new Error('execution reverted: EpochIdMismatch()');
      },
    });
    const failed: unknown[] = [];
    submitter.on('txFailed', (e) => failed.push(e.error));

    await expect(submitter.submit({ account, to: TO, data: '0x01' })).rejects.toThrow('EpochIdMismatch');
    expect(walletClient.sendTransaction).toHaveBeenCalledTimes(1);
    expect(failed).toHaveLength(1);
  });

  it('treats a reverted receipt as a failure', async () => {
    const { submitter } = fakes({ status: 'reverted' });
    await expect(submitter.submit({ account, to: TO, data: '0x01' })).rejects.toBeInstanceOf(TransactionRevertedError);
  });
});
