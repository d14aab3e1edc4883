#!/usr/bin/env node
import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createPublicClient, http } from 'viem';
import { DutchmineClient, accruedEmission, wadToDecimal } from '@dutchmine/sdk';

import { DEFAULT_CONFIG_PATH, expandHome, loadKeeperConfig } from './config/config.js';
import { PRIVATE_KEY_ENV } from './config/keys.js';
import { KeeperDaemon } from './daemon.js';
import { KeeperDB } from './storage/db.js';

type PidFile = { pid: number; started_at: number; keeper?: string };

async function writePidFile(dataDir: string, pidFile: PidFile): Promise<void> {
  await fs.mkdir(dataDir, { recursive: true });
  await fs.writeFile(path.join(dataDir, 'keeper.pid'), JSON.stringify(pidFile), 'utf8');
}

const STARTER_CONFIG = `# ~/.dutchmine/keeper.toml
# Fill in values from your deployment. Token amounts are quoted integer strings (wei).

keeperAddress = "0x..."
# Or set ${PRIVATE_KEY_ENV}.
privateKeyPath = "~/.dutchmine/keeper/key.hex"

dataDir = "~/.dutchmine/keeper"
rpcUrl = "https://..."

pollIntervalMs = 12000
deadlineSlackSec = 60

[deployment]
chain_id = 0
# mining_auction = "0x..."
# treasury_auction = "0x..."
# unit_token = "0x..."
# payment_token = "0x..."

[strategy.mining]
enabled = false
maxPrice = "0"
uri = ""

[strategy.treasury]
enabled = false
assets = []
minProfitBps = 100

[strategy.treasury.valuations]
# "0x..." = "1000000000000000000"

[telemetry]
logLevel = "info"
# healthPort = 8787
`;

const program = new Command();
program.name('dutchmine-keeper').description('Settles dutchmine auctions when they become worth taking').version('0.1.0');

program
  .command('init')
  .description('Create a starter keeper.toml config')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    const configPath = expandHome(opts.config);

    await fs.mkdir(path.dirname(configPath), { recursive: true });
    try {
      await fs.writeFile(configPath, STARTER_CONFIG, { flag: 'wx' });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`init: failed to write ${configPath}: ${msg}`);
    }

    process.stdout.write(`Wrote starter config: ${configPath}\n`);
  });

program
  .command('start')
  .description('Run the keeper in the foreground')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    const daemon = new KeeperDaemon({ configPath: opts.config });
    await daemon.start();

    const cfg = await loadKeeperConfig(opts.config);
    await writePidFile(cfg.dataDir, { pid: process.pid, started_at: Date.now(), keeper: daemon.status().keeper });

    const shutdown = async (signal: string) => {
      process.stdout.write(`\nReceived ${signal}, shutting down...\n`);
      try {
        await daemon.stop();
      } finally {
        process.exit(0);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Keep process alive.
    await new Promise(() => undefined);
  });

program
  .command('status')
  .description('Summarise the local settlement journal')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .option('-n, --limit <n>', 'Recent settlements to list', '10')
  .action(async (opts: { config: string; limit: string }) => {
    const cfg = await loadKeeperConfig(opts.config);
    const db = await KeeperDB.open(cfg.dataDir);

    try {
      const summary = db.summarize();
      const lastTick = db.getMeta('last_tick');
      process.stdout.write(`keeper:    ${cfg.keeperAddress}\n`);
      process.stdout.write(`last tick: ${lastTick ? new Date(Number(lastTick)).toISOString() : 'never'}\n`);
      process.stdout.write(
        `settles:   confirmed=${summary.confirmed} lost_race=${summary.lost_race} failed=${summary.failed} pending=${summary.pending}\n`,
      );
      for (const s of db.listSettlements({ limit: Number(opts.limit) })) {
        process.stdout.write(`  #${s.id} ${s.auction} epoch=${s.epoch_id} price=${s.price} ${s.status} ${s.tx_hash ?? ''}\n`);
      }
    } finally {
      db.close();
    }
  });

program
  .command('quote')
  .description('Read current prices, rate and epoch ids of both auctions, and the holder\'s unit balance')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    const cfg = await loadKeeperConfig(opts.config);
    const client = createPublicClient({ transport: http(cfg.rpcUrl) });
    const sdk = new DutchmineClient(cfg.deployment, client);

    const [mining, treasury] = await Promise.all([sdk.mining_auction.readState(), sdk.treasury_auction.readState()]);

    process.stdout.write(`block:     ${mining.blockNumber}\n`);
    process.stdout.write(
      `mining:    epoch=${mining.epoch.epochId} price=${wadToDecimal(mining.price, 6)} rate=${wadToDecimal(mining.rate, 6)}/s holder=${mining.epoch.holder}\n`,
    );
    process.stdout.write(`treasury:  epoch=${treasury.epoch.epochId} price=${wadToDecimal(treasury.price, 6)}\n`);

    const holder = mining.epoch.holder;
    const balance = await sdk.unit_token.balanceOf(holder);
    const pending = accruedEmission(mining.epoch.startTime, mining.epoch.rate, mining.timestamp);
    process.stdout.write(`holder:    balance=${wadToDecimal(balance, 6)} pending=${wadToDecimal(pending, 6)}\n`);
  });

await program.parseAsync(process.argv);
