import { promises as fs } from 'node:fs';

import type { Hex } from 'viem';
import { isHex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import type { PrivateKeyAccount } from 'viem/accounts';

export const PRIVATE_KEY_ENV = 'DUTCHMINE_KEEPER_PRIVATE_KEY';

function parsePrivateKey(text: string, source: string): Hex {
  const trimmed = text.trim();
  const withPrefix = trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`;
  if (!isHex(withPrefix) || withPrefix.length !== 66) {
    throw new Error(`KeeperKey: invalid private key in ${source} (expected 32-byte hex)`);
  }
  return withPrefix;
}

/** Resolves the keeper's signing account; the environment variable takes precedence over the key file. */
export async function loadKeeperAccount(args: {
  privateKeyPath?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<PrivateKeyAccount> {
  const env = args.env ?? process.env;

  const fromEnv = env[PRIVATE_KEY_ENV];
  if (fromEnv) return privateKeyToAccount(parsePrivateKey(fromEnv, PRIVATE_KEY_ENV));

  if (!args.privateKeyPath) {
    throw new Error(`KeeperKey: no private key (set ${PRIVATE_KEY_ENV} or privateKeyPath)`);
  }

  const text = await fs.readFile(args.privateKeyPath, 'utf8');
  return privateKeyToAccount(parsePrivateKey(text, args.privateKeyPath));
}
