import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from './logger';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS settings (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  usd_amount REAL NOT NULL,
  alert_reset_minutes INTEGER NOT NULL,
  rsi_interval TEXT NOT NULL,
  rsi_reset_enabled INTEGER NOT NULL,
  tracked_token TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS price_samples (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp INTEGER NOT NULL,
  buy_price REAL NOT NULL,
  sell_price REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS price_thresholds (
  side TEXT NOT NULL CHECK (side IN ('buy', 'sell')),
  value_key TEXT NOT NULL,
  value REAL NOT NULL,
  last_triggered_at INTEGER,
  PRIMARY KEY (side, value_key)
);

CREATE TABLE IF NOT EXISTS rsi_alerts (
  direction TEXT NOT NULL CHECK (direction IN ('above', 'below')),
  threshold_key TEXT NOT NULL,
  threshold REAL NOT NULL,
  triggered INTEGER NOT NULL DEFAULT 0,
  last_triggered_at INTEGER,
  PRIMARY KEY (direction, threshold_key)
);

CREATE TABLE IF NOT EXISTS wallets (
  position INTEGER PRIMARY KEY AUTOINCREMENT,
  address TEXT NOT NULL UNIQUE,
  added_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS wallet_pnl (
  address TEXT PRIMARY KEY,
  holding REAL NOT NULL,
  realized REAL NOT NULL,
  unrealized REAL NOT NULL,
  current_value REAL NOT NULL,
  cost_basis REAL NOT NULL,
  last_trade_time,
  fetched_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS pnl_snapshot (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  run_at INTEGER NOT NULL,
  holding REAL NOT NULL,
  realized REAL NOT NULL,
  unrealized REAL NOT NULL,
  current_value REAL NOT NULL,
  cost_basis REAL NOT NULL,
  last_trade_time INTEGER,
  failed_wallets TEXT NOT NULL,
  stale_wallets TEXT NOT NULL
);
`;

export const IN_MEMORY = ':memory:';

export class DatabaseManager {
  readonly db: Database.Database;
  private readonly location: string;

  constructor(location: string = process.env.DATABASE_PATH || './data/alerts.db') {
    this.location = location;

    if (location !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(location)), { recursive: true });
    }

    this.db = new Database(location);
    this.configure();
    this.db.exec(SCHEMA_SQL);

    logger.info('Database initialized', { location });
  }

  private configure(): void {
    if (this.location === IN_MEMORY) {
      return;
    }

    try {
      this.db.pragma('journal_mode = WAL');
    } catch (error) {
      logger.warn('Could not enable WAL mode, continuing with default:', error);
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('temp_store = MEMORY');
  }

  healthCheck(): { healthy: boolean; latency: number; error?: string } {
    try {
      const start = Date.now();
      this.db.prepare('SELECT 1').get();
      return { healthy: true, latency: Date.now() - start };
    } catch (error) {
      return {
        healthy: false,
        latency: -1,
        error: error instanceof Error ? error.message : 'Unknown error'
      };
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info('Database closed');
    }
  }
}
