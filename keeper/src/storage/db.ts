import path from 'node:path';
import { promises as fs } from 'node:fs';

import Database from 'better-sqlite3';

export type AuctionKind = 'mining' | 'treasury';

export type SettlementStatus = 'pending' | 'confirmed' | 'failed' | 'lost_race';

export type ObservedEpochRow = {
  auction: AuctionKind;
  epoch_id: number;
  init_price: string;
  start_time: number;
  observed_at: number;
};

export type SettlementRow = {
  id: number;
  auction: AuctionKind;
  epoch_id: number;
  price: string;
  status: SettlementStatus;
  tx_hash: string | null;
  error: string | null;
  created_at: number;
  updated_at: number;
};

export type NewSettlement = {
  auction: AuctionKind;
  epoch_id: bigint;
  price: bigint;
  created_at: number;
};

export type SettlementSummary = Record<SettlementStatus, number>;

export class KeeperDB {
  public readonly filePath: string;
  private readonly db: Database.Database;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.db = new Database(filePath);

    this.applyPragmas();
    this.migrate();
  }

  static async open(dataDir: string): Promise<KeeperDB> {
    await fs.mkdir(dataDir, { recursive: true });
    return new KeeperDB(path.join(dataDir, 'keeper.db'));
  }

  close(): void {
    this.db.close();
  }

  getJournalMode(): string {
    return String(this.db.pragma('journal_mode', { simple: true }));
  }

  private applyPragmas(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS observed_epochs (
        auction TEXT NOT NULL,
        epoch_id INT NOT NULL,
        init_price TEXT NOT NULL,
        start_time INT NOT NULL,
        observed_at INT NOT NULL,
        PRIMARY KEY (auction, epoch_id)
      );

      CREATE TABLE IF NOT EXISTS settlements (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        auction TEXT NOT NULL,
        epoch_id INT NOT NULL,
        price TEXT NOT NULL,
        status TEXT NOT NULL,
        tx_hash TEXT,
        error TEXT,
        created_at INT NOT NULL,
        updated_at INT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_settlements_auction_epoch ON settlements(auction, epoch_id);
    `);
  }

  // ─── meta ───────────────────────────────────────────────────────────────

  getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(key);
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare('INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
      .run(key, value);
  }

  // ─── observed_epochs ────────────────────────────────────────────────────

  /** Returns false when the epoch was already recorded. */
  recordEpoch(row: { auction: AuctionKind; epoch_id: bigint; init_price: bigint; start_time: bigint; observed_at: number }): boolean {
    const res = this.db
      .prepare(
        `INSERT INTO observed_epochs (auction, epoch_id, init_price, start_time, observed_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(auction, epoch_id) DO NOTHING`,
      )
      .run(row.auction, row.epoch_id, row.init_price.toString(), row.start_time, row.observed_at);
    return res.changes > 0;
  }

  listEpochs(auction: AuctionKind): ObservedEpochRow[] {
    return this.db
      .prepare<[string], ObservedEpochRow>('SELECT * FROM observed_epochs WHERE auction = ? ORDER BY epoch_id ASC')
      .all(auction);
  }

  // ─── settlements ────────────────────────────────────────────────────────

  insertSettlement(s: NewSettlement): number {
    const res = this.db
      .prepare(
        `INSERT INTO settlements (auction, epoch_id, price, status, created_at, updated_at)
         VALUES (?, ?, ?, 'pending', ?, ?)`,
      )
      .run(s.auction, s.epoch_id, s.price.toString(), s.created_at, s.created_at);
    return Number(res.lastInsertRowid);
  }

  updateSettlement(
    id: number,
    update: { status: SettlementStatus; tx_hash?: string; error?: string; updated_at: number },
  ): void {
    this.db
      .prepare(
        `UPDATE settlements
         SET status = ?, tx_hash = COALESCE(?, tx_hash), error = COALESCE(?, error), updated_at = ?
         WHERE id = ?`,
      )
      .run(update.status, update.tx_hash ?? null, update.error ?? null, update.updated_at, id);
  }

  getSettlement(id: number): SettlementRow | undefined {
    return this.db.prepare<[number], SettlementRow>('SELECT * FROM settlements WHERE id = ?').get(id);
  }

  listSettlements(opts: { auction?: AuctionKind; limit?: number } = {}): SettlementRow[] {
    const limit = opts.limit ?? 50;
    if (opts.auction) {
      return this.db
        .prepare<[string, number], SettlementRow>('SELECT * FROM settlements WHERE auction = ? ORDER BY id DESC LIMIT ?')
        .all(opts.auction, limit);
    }
    return this.db.prepare<[number], SettlementRow>('SELECT * FROM settlements ORDER BY id DESC LIMIT ?').all(limit);
  }

  /** Settlements that never left `pending`, e.g. after a crash mid-submit. */
  listPendingSettlements(): SettlementRow[] {
    return this.db
      .prepare<[], SettlementRow>("SELECT * FROM settlements WHERE status = 'pending' ORDER BY id ASC")
      .all();
  }

  summarize(): SettlementSummary {
    const summary: SettlementSummary = { pending: 0, confirmed: 0, failed: 0, lost_race: 0 };
    const rows = this.db
      .prepare<[], { status: string; n: number }>('SELECT status, COUNT(*) AS n FROM settlements GROUP BY status')
      .all();
    for (const r of rows) {
      if (r.status === 'pending' || r.status === 'confirmed' || r.status === 'failed' || r.status === 'lost_race') {
        summary[r.status] = r.n;
      }
    }
    return summary;
  }
}
