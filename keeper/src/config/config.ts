import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { Address } from 'viem';
import { getAddress, isAddress } from 'viem';
import type { DutchmineDeployment } from '@dutchmine/sdk';

import * as smolToml from 'smol-toml';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type MiningStrategyConfig = {
  enabled: boolean;
  // Receives the emission right; defaults to the keeper wallet.
  miner: Address;
  maxPrice: bigint;
  uri: string;
};

export type TreasuryStrategyConfig = {
  enabled: boolean;
  assets: Address[];
  assetsReceiver: Address;
  minProfitBps: bigint;
  // Value of 1e18 base units of each asset, denominated in the payment token.
  valuations: Record<Address, bigint>;
};

export type KeeperConfig = {
  keeperAddress: Address;
  privateKeyPath?: string;

  rpcUrl: string;
  chainId: bigint;
  deployment: DutchmineDeployment;

  dataDir: string;
  pollIntervalMs: number;
  deadlineSlackSec: bigint;

  mining: MiningStrategyConfig;
  treasury: TreasuryStrategyConfig;

  telemetry: {
    logLevel: LogLevel;
    healthPort?: number;
  };
};

type Table = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.dutchmine', 'keeper.toml');

export function expandHome(p: string): string {
  if (!p) return p;
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function isTable(v: unknown): v is Table {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asTable(v: unknown, field: string): Table {
  if (v == null) return {};
  if (!isTable(v)) throw new Error(`Config: invalid ${field} (expected table)`);
  return v;
}

function asString(v: unknown, field: string): string {
  if (typeof v !== 'string' || !v) throw new Error(`Config: missing/invalid ${field}`);
  return v;
}

function asOptionalString(v: unknown, field: string): string | undefined {
  if (v == null) return undefined;
  if (typeof v !== 'string') throw new Error(`Config: invalid ${field} (expected string)`);
  return v;
}

function asBoolean(v: unknown, field: string, defaultValue: boolean): boolean {
  if (v == null) return defaultValue;
  if (typeof v !== 'boolean') throw new Error(`Config: invalid ${field} (expected boolean)`);
  return v;
}

function asNumber(v: unknown, field: string, defaultValue?: number): number {
  if (v == null) {
    if (defaultValue == null) throw new Error(`Config: missing ${field}`);
    return defaultValue;
  }
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new Error(`Config: invalid ${field} (expected number)`);
  return v;
}

function asBigInt(v: unknown, field: string, defaultValue?: bigint): bigint {
  if (v == null) {
    if (defaultValue == null) throw new Error(`Config: missing ${field}`);
    return defaultValue;
  }
  if (typeof v === 'bigint') return v;
  if (typeof v === 'number') {
    if (!Number.isInteger(v)) throw new Error(`Config: invalid ${field} (expected integer)`);
    return BigInt(v);
  }
  if (typeof v === 'string') {
    // Large wei amounts do not survive TOML/JSON numbers, so they are usually quoted.
    if (!/^\d+$/.test(v)) throw new Error(`Config: invalid ${field} (expected integer string)`);
    return BigInt(v);
  }
  throw new Error(`Config: invalid ${field} (expected bigint-compatible)`);
}

function asNonNegative(v: unknown, field: string, defaultValue?: bigint): bigint {
  const n = asBigInt(v, field, defaultValue);
  if (n < 0n) throw new Error(`Config: invalid ${field} (must be >= 0)`);
  return n;
}

function asAddress(v: unknown, field: string): Address {
  const s = asString(v, field);
  if (!isAddress(s)) throw new Error(`Config: invalid ${field} (not an address)`);
  return getAddress(s);
}

function asLogLevel(v: unknown): LogLevel {
  if (v == null) return 'info';
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  throw new Error('Config: invalid telemetry.logLevel');
}

function asArray(v: unknown, field: string): unknown[] {
  if (v == null) return [];
  if (!Array.isArray(v)) throw new Error(`Config: invalid ${field} (expected array)`);
  return v;
}

function normalizeDeployment(v: unknown): DutchmineDeployment {
  if (!isTable(v)) throw new Error('Config: missing deployment');

  return {
    chain_id: asBigInt(v.chain_id, 'deployment.chain_id'),
    mining_auction: asAddress(v.mining_auction, 'deployment.mining_auction'),
    treasury_auction: asAddress(v.treasury_auction, 'deployment.treasury_auction'),
    unit_token: asAddress(v.unit_token, 'deployment.unit_token'),
    payment_token: asAddress(v.payment_token, 'deployment.payment_token'),
  };
}

function normalizeMining(raw: Table, keeperAddress: Address): MiningStrategyConfig {
  const enabled = asBoolean(raw.enabled, 'mining.enabled', false);
  const miner = raw.miner != null ? asAddress(raw.miner, 'mining.miner') : keeperAddress;

  return {
    enabled,
    miner,
    // Required only when the strategy runs.
    maxPrice: asNonNegative(raw.maxPrice ?? raw.max_price, 'mining.maxPrice', enabled ? undefined : 0n),
    uri: asOptionalString(raw.uri, 'mining.uri') ?? '',
  };
}

function normalizeTreasury(raw: Table, keeperAddress: Address): TreasuryStrategyConfig {
  const enabled = asBoolean(raw.enabled, 'treasury.enabled', false);
  const assets = asArray(raw.assets, 'treasury.assets').map((a, i) => asAddress(a, `treasury.assets[${i}]`));
  if (enabled && assets.length === 0) throw new Error('Config: treasury.assets must not be empty');

  const valuationsRaw = asTable(raw.valuations, 'treasury.valuations');
  const valuations: Record<Address, bigint> = {};
  for (const [key, value] of Object.entries(valuationsRaw)) {
    valuations[asAddress(key, 'treasury.valuations key')] = asNonNegative(value, `treasury.valuations.${key}`);
  }

  const receiver =
    raw.assetsReceiver != null || raw.assets_receiver != null
      ? asAddress(raw.assetsReceiver ?? raw.assets_receiver, 'treasury.assetsReceiver')
      : keeperAddress;

  return {
    enabled,
    assets,
    assetsReceiver: receiver,
    minProfitBps: asNonNegative(raw.minProfitBps ?? raw.min_profit_bps, 'treasury.minProfitBps', 0n),
    valuations,
  };
}

export function normalizeConfig(raw: unknown): KeeperConfig {
  if (!isTable(raw)) throw new Error('Config: expected a table at the top level');

  const dataDir = expandHome(
    asOptionalString(raw.dataDir ?? raw.data_dir, 'dataDir') ?? path.join(os.homedir(), '.dutchmine', 'keeper'),
  );

  const keeperAddress = asAddress(raw.keeperAddress ?? raw.keeper_address, 'keeperAddress');
  const deployment = normalizeDeployment(raw.deployment);

  const rpcUrl = asString(raw.rpcUrl ?? raw.rpc_url, 'rpcUrl');
  const chainId = asBigInt(raw.chainId ?? raw.chain_id, 'chainId', deployment.chain_id);
  if (chainId !== deployment.chain_id) {
    throw new Error(`Config: chainId ${chainId} does not match deployment.chain_id ${deployment.chain_id}`);
  }

  const privateKeyRaw = asOptionalString(raw.privateKeyPath ?? raw.private_key_path, 'privateKeyPath');
  const privateKeyPath = privateKeyRaw != null ? expandHome(privateKeyRaw) : undefined;

  const pollIntervalMs = asNumber(raw.pollIntervalMs ?? raw.poll_interval_ms, 'pollIntervalMs', 12_000);
  if (pollIntervalMs < 250) throw new Error('Config: pollIntervalMs must be >= 250');

  const deadlineSlackSec = asBigInt(raw.deadlineSlackSec ?? raw.deadline_slack_sec, 'deadlineSlackSec', 60n);
  if (deadlineSlackSec <= 0n) throw new Error('Config: deadlineSlackSec must be > 0');

  const strategy = asTable(raw.strategy, 'strategy');
  const mining = normalizeMining(asTable(strategy.mining, 'strategy.mining'), keeperAddress);
  const treasury = normalizeTreasury(asTable(strategy.treasury, 'strategy.treasury'), keeperAddress);

  const telemetryRaw = asTable(raw.telemetry, 'telemetry');
  const healthPortRaw = telemetryRaw.healthPort ?? telemetryRaw.health_port;

  return {
    keeperAddress,
    privateKeyPath,
    rpcUrl,
    chainId,
    deployment,
    dataDir,
    pollIntervalMs,
    deadlineSlackSec,
    mining,
    treasury,
    telemetry: {
      logLevel: asLogLevel(telemetryRaw.logLevel ?? telemetryRaw.log_level),
      healthPort: healthPortRaw != null ? asNumber(healthPortRaw, 'telemetry.healthPort') : undefined,
    },
  };
}

export async function loadKeeperConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<KeeperConfig> {
  const p = expandHome(configPath);
  const rawText = await fs.readFile(p, 'utf8');

  let raw: unknown;
  const ext = path.extname(p).toLowerCase();

  if (ext === '.json') {
    raw = JSON.parse(rawText);
  } else {
    // TOML first, JSON as a fallback.
    try {
      raw = smolToml.parse(rawText);
    } catch (errToml) {
      try {
        raw = JSON.parse(rawText);
      } catch {
        const msg = errToml instanceof Error ? errToml.message : String(errToml);
        throw new Error(`Config: failed to parse TOML (and JSON fallback failed): ${msg}`);
      }
    }
  }

  return normalizeConfig(raw);
}
