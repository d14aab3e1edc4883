import pino from 'pino';
import type { Logger } from 'pino';

import type { Address, Hex, LocalAccount, PublicClient, WalletClient } from 'viem';
import { createPublicClient, createWalletClient, http } from 'viem';

import type { ERC20Contract, MiningEpochView, PreparedCall, TreasuryEpochView } from '@dutchmine/sdk';
import { DutchmineClient, EpochIdMismatch, decodeAuctionRevert } from '@dutchmine/sdk';

import type { KeeperConfig } from './config/config.js';
import { DEFAULT_CONFIG_PATH, loadKeeperConfig } from './config/config.js';
import { loadKeeperAccount } from './config/keys.js';
import type { TxRequest } from './chain/submitter.js';
import { TxSubmitter } from './chain/submitter.js';
import type { Holding } from './strategy/planner.js';
import { holdingsValue, planBuy, planMine } from './strategy/planner.js';
import type { AuctionKind } from './storage/db.js';
import { KeeperDB } from './storage/db.js';
import { Metrics } from './telemetry/metrics.js';
import type { AuctionHealth, HealthStatus } from './telemetry/health.js';
import { HealthServer } from './telemetry/health.js';

export type Submitter = { submit(request: TxRequest): Promise<Hex> };

export type KeeperDaemonDeps = {
  loadConfig?: (configPath: string) => Promise<KeeperConfig>;
  loadAccount?: (config: KeeperConfig) => Promise<LocalAccount>;
  openDb?: (dataDir: string) => Promise<KeeperDB>;
  createPublicClient?: (rpcUrl: string) => PublicClient;
  createWalletClient?: (rpcUrl: string, account: LocalAccount) => WalletClient;
  createSdkClient?: (deployment: KeeperConfig['deployment'], client: PublicClient) => DutchmineClient;
  createSubmitter?: (args: { publicClient: PublicClient; walletClient: WalletClient; logger: Logger }) => Submitter;
  createHealthServer?: (args: {
    port: number;
    getStatus: () => HealthStatus;
    getMetrics: () => string;
  }) => HealthServer;
  // Wall clock for journal timestamps, in ms.
  now?: () => number;
};

export type TickOutcome =
  | { action: 'wait'; reason: string; until?: bigint }
  | { action: 'settled'; hash: Hex; epochId: bigint; price: bigint }
  | { action: 'lost_race'; epochId: bigint }
  | { action: 'error'; error: string };

export type TickReport = Partial<Record<AuctionKind, TickOutcome>>;

type KeeperContext = {
  config: KeeperConfig;
  logger: Logger;
  db: KeeperDB;
  sdk: DutchmineClient;
  account: LocalAccount;
  submitter: Submitter;
};

function defaultSubmitter(args: { publicClient: PublicClient; walletClient: WalletClient; logger: Logger }): Submitter {
  const submitter = new TxSubmitter({ publicClient: args.publicClient, walletClient: args.walletClient });
  submitter.on('txSent', (e) => args.logger.debug({ txHash: e.hash, nonce: e.nonce, to: e.to }, 'Transaction sent'));
  submitter.on('txFailed', (e) => {
    const msg = e.error instanceof Error ? e.error.message : String(e.error);
    args.logger.warn({ err: msg }, 'Transaction failed');
  });
  return submitter;
}

export class KeeperDaemon {
  private readonly deps: KeeperDaemonDeps;
  private readonly configPath: string;
  private readonly now: () => number;

  private logger?: Logger;
  private ctx?: KeeperContext;
  public readonly metrics = new Metrics();

  private timer?: NodeJS.Timeout;
  private inflight?: Promise<TickReport>;
  private healthServer?: HealthServer;

  private ready = false;
  private lastTick?: number;
  private readonly warnings: string[] = [];
  private readonly auctions: Partial<Record<AuctionKind, AuctionHealth>> = {};

  constructor(args?: { configPath?: string; logger?: Logger; deps?: KeeperDaemonDeps }) {
    this.configPath = args?.configPath ?? DEFAULT_CONFIG_PATH;
    this.logger = args?.logger;
    this.deps = args?.deps ?? {};
    this.now = this.deps.now ?? Date.now;
  }

  /** Loads config, opens the journal and clients, then starts polling unless `schedule` is false. */
  async start(args?: { schedule?: boolean }): Promise<void> {
    if (this.ready) return;

    const config = await (this.deps.loadConfig ?? loadKeeperConfig)(this.configPath);

    const logger = this.logger ?? pino({ name: 'dutchmine-keeper', level: config.telemetry.logLevel });
    this.logger = logger;
    logger.info({ configPath: this.configPath }, 'Loaded keeper config');

    const account = await (this.deps.loadAccount ?? ((c) => loadKeeperAccount({ privateKeyPath: c.privateKeyPath })))(
      config,
    );
    if (account.address.toLowerCase() !== config.keeperAddress.toLowerCase()) {
      throw new Error(`KeeperDaemon: key address ${account.address} does not match keeperAddress ${config.keeperAddress}`);
    }

    const publicClient = (this.deps.createPublicClient ?? ((url) => createPublicClient({ transport: http(url) })))(
      config.rpcUrl,
    );

    const chainId = BigInt(await publicClient.getChainId());
    if (chainId !== config.chainId) {
      throw new Error(`KeeperDaemon: RPC chain id ${chainId} does not match configured ${config.chainId}`);
    }

    const walletClient = (
      this.deps.createWalletClient ?? ((url, acct) => createWalletClient({ account: acct, transport: http(url) }))
    )(config.rpcUrl, account);

    const db = await (this.deps.openDb ?? KeeperDB.open)(config.dataDir);
    const sdk = (this.deps.createSdkClient ?? ((d, c) => new DutchmineClient(d, c)))(config.deployment, publicClient);
    const submitter = (this.deps.createSubmitter ?? defaultSubmitter)({ publicClient, walletClient, logger });

    this.ctx = { config, logger, db, sdk, account, submitter };

    const pending = db.listPendingSettlements();
    if (pending.length > 0) {
      this.warnings.push(`${pending.length} settlement(s) left pending by a previous run`);
      logger.warn({ ids: pending.map((p) => p.id) }, 'Found pending settlements from a previous run');
    }

    if (config.telemetry.healthPort != null) {
      this.healthServer = (this.deps.createHealthServer ?? ((a) => new HealthServer(a)))({
        port: config.telemetry.healthPort,
        getStatus: () => this.status(),
        getMetrics: () => this.metrics.render(),
      });
      await this.healthServer.start();
    }

    this.ready = true;
    logger.info(
      { keeper: account.address, chainId: chainId.toString(), mining: config.mining.enabled, treasury: config.treasury.enabled },
      'Keeper ready',
    );

    if (args?.schedule ?? true) this.scheduleNextTick(0);
  }

  async stop(): Promise<void> {
    if (!this.ready) return;
    this.ready = false;

    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;

    // Let an in-flight tick finish writing to the journal.
    if (this.inflight) await this.inflight;

    if (this.healthServer) await this.healthServer.stop();
    this.ctx?.db.close();
    this.logger?.info('Keeper stopped');
  }

  /** Healthy once started and while no enabled auction's last poll failed. */
  status(): HealthStatus {
    const failing = Object.values(this.auctions).some((a) => a?.lastAction === 'error');
    return {
      ok: this.ready && !failing,
      ready: this.ready,
      keeper: this.ctx?.account.address,
      chain_id: this.ctx?.config.chainId.toString(),
      last_tick: this.lastTick,
      warnings: [...this.warnings],
      auctions: { ...this.auctions },
    };
  }

  /** One poll over every enabled auction; failures are reported per auction instead of thrown. */
  async tick(): Promise<TickReport> {
    const ctx = this.getContext();
    const report: TickReport = {};

    this.metrics.inc('ticks');

    if (ctx.config.mining.enabled) report.mining = await this.guarded(ctx, 'mining', () => this.runMining(ctx));
    if (ctx.config.treasury.enabled) report.treasury = await this.guarded(ctx, 'treasury', () => this.runTreasury(ctx));

    this.lastTick = this.now();
    this.metrics.setGauge('last_tick_unix', Math.floor(this.lastTick / 1000));
    ctx.db.setMeta('last_tick', String(this.lastTick));
    return report;
  }

  private getContext(): KeeperContext {
    if (!this.ctx) throw new Error('KeeperDaemon: not initialized');
    return this.ctx;
  }

  private scheduleNextTick(delayMs: number): void {
    this.timer = setTimeout(() => {
      const run = this.tick().finally(() => {
        this.inflight = undefined;
        if (this.ready) this.scheduleNextTick(this.getContext().config.pollIntervalMs);
      });
      this.inflight = run;
    }, delayMs);
  }

  private async guarded(ctx: KeeperContext, auction: AuctionKind, fn: () => Promise<TickOutcome>): Promise<TickOutcome> {
    let outcome: TickOutcome;
    try {
      outcome = await fn();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.metrics.inc('tick_errors');
      ctx.logger.error({ auction, err: msg }, 'Keeper tick failed');
      outcome = { action: 'error', error: msg };
    }

    const health: AuctionHealth = { ...this.auctions[auction] };
    health.lastAction = outcome.action === 'wait' ? 'wait' : outcome.action === 'error' ? 'error' : 'settle';
    health.lastReason = outcome.action === 'wait' ? outcome.reason : outcome.action === 'error' ? outcome.error : outcome.action;
    this.auctions[auction] = health;
    return outcome;
  }

  private observe(ctx: KeeperContext, auction: AuctionKind, epoch: MiningEpochView | TreasuryEpochView, price: bigint): void {
    const fresh = ctx.db.recordEpoch({
      auction,
      epoch_id: epoch.epochId,
      init_price: epoch.initPrice,
      start_time: epoch.startTime,
      observed_at: this.now(),
    });
    if (fresh) {
      this.metrics.inc('epochs_observed');
      ctx.logger.info(
        { auction, epochId: epoch.epochId.toString(), initPrice: epoch.initPrice.toString() },
        'New auction epoch',
      );
    }
    this.auctions[auction] = { ...this.auctions[auction], epochId: epoch.epochId.toString(), price: price.toString() };
  }

  private async runMining(ctx: KeeperContext): Promise<TickOutcome> {
    const state = await ctx.sdk.mining_auction.readState();

    this.metrics.setGauge('mining_price', state.price);
    this.metrics.setGauge('mining_rate', state.rate);
    this.metrics.setGauge('mining_epoch_id', state.epoch.epochId);
    this.observe(ctx, 'mining', state.epoch, state.price);

    const plan = planMine(state, {
      miner: ctx.config.mining.miner,
      maxPrice: ctx.config.mining.maxPrice,
      uri: ctx.config.mining.uri,
      deadlineSlackSec: ctx.config.deadlineSlackSec,
    });

    if (plan.action === 'wait') {
      ctx.logger.debug(
        { epochId: state.epoch.epochId.toString(), price: state.price.toString(), until: plan.until?.toString() },
        'Mining auction: waiting',
      );
      return plan;
    }

    await this.ensureAllowance(ctx, ctx.sdk.payment_token, ctx.sdk.mining_auction.address, plan.price);

    return this.settle(ctx, 'mining', plan.intent.epochId, plan.price, async () => {
      await ctx.sdk.mining_auction.simulateMine(ctx.account, plan.intent);
      return ctx.sdk.mining_auction.encodeMine(plan.intent);
    });
  }

  private async runTreasury(ctx: KeeperContext): Promise<TickOutcome> {
    const auction = ctx.sdk.treasury_auction;
    const state = await auction.readState();

    this.metrics.setGauge('treasury_price', state.price);
    this.metrics.setGauge('treasury_epoch_id', state.epoch.epochId);
    this.observe(ctx, 'treasury', state.epoch, state.price);

    const holdings: Holding[] = await Promise.all(
      ctx.config.treasury.assets.map(async (asset) => ({
        asset,
        balance: await ctx.sdk.erc20(asset).balanceOf(auction.address),
      })),
    );
    this.metrics.setGauge('treasury_value', holdingsValue(holdings, ctx.config.treasury.valuations));

    const plan = planBuy(state, holdings, ctx.config.treasury.valuations, {
      assetsReceiver: ctx.config.treasury.assetsReceiver,
      minProfitBps: ctx.config.treasury.minProfitBps,
      deadlineSlackSec: ctx.config.deadlineSlackSec,
    });

    if (plan.action === 'wait') {
      ctx.logger.debug(
        { epochId: state.epoch.epochId.toString(), price: state.price.toString(), reason: plan.reason },
        'Treasury auction: waiting',
      );
      return plan;
    }

    const paymentToken = ctx.sdk.erc20(await auction.paymentToken());
    await this.ensureAllowance(ctx, paymentToken, auction.address, plan.price);

    return this.settle(ctx, 'treasury', plan.intent.epochId, plan.price, async () => {
      await auction.simulateBuy(ctx.account, plan.intent);
      return auction.encodeBuy(plan.intent);
    });
  }

  private async ensureAllowance(ctx: KeeperContext, token: ERC20Contract, spender: Address, amount: bigint): Promise<void> {
    if (amount === 0n) return;

    const current = await token.allowance(ctx.account.address, spender);
    if (current >= amount) return;

    const hash = await ctx.submitter.submit({ account: ctx.account, ...token.encodeApprove(spender, amount) });
    this.metrics.inc('approvals_submitted');
    ctx.logger.info({ token: token.address, spender, amount: amount.toString(), txHash: hash }, 'Approved payment token');
  }

  /**
   * Journals the attempt, then simulates and submits. An epoch id mismatch
   * means another settle landed first; it is recorded and not retried.
   */
  private async settle(
    ctx: KeeperContext,
    auction: AuctionKind,
    epochId: bigint,
    price: bigint,
    prepare: () => Promise<PreparedCall>,
  ): Promise<TickOutcome> {
    const id = ctx.db.insertSettlement({ auction, epoch_id: epochId, price, created_at: this.now() });
    this.metrics.inc('settlements_submitted');

    try {
      const call = await prepare();
      const hash = await ctx.submitter.submit({ account: ctx.account, ...call });

      ctx.db.updateSettlement(id, { status: 'confirmed', tx_hash: hash, updated_at: this.now() });
      this.metrics.inc('settlements_confirmed');
      ctx.logger.info(
        { auction, epochId: epochId.toString(), price: price.toString(), txHash: hash },
        'Settled auction epoch',
      );
      return { action: 'settled', hash, epochId, price };
    } catch (raw) {
      const err = decodeAuctionRevert(raw);
      const msg = err instanceof Error ? err.message : String(err);

      if (err instanceof EpochIdMismatch) {
        ctx.db.updateSettlement(id, { status: 'lost_race', error: msg, updated_at: this.now() });
        this.metrics.inc('epoch_races_lost');
        ctx.logger.warn({ auction, epochId: epochId.toString() }, 'Epoch already settled by someone else');
        return { action: 'lost_race', epochId };
      }

      ctx.db.updateSettlement(id, { status: 'failed', error: msg, updated_at: this.now() });
      this.metrics.inc('settlements_failed');
      throw err;
    }
  }
}
