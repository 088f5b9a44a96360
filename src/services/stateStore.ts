import Database from 'better-sqlite3';
import { PriceSample, PriceThreshold, PRICE_HISTORY_LIMIT, ThresholdSide } from '../types/prices';
import { RsiAlert, RsiConfig, RsiInterval, isRsiInterval } from '../types/rsi';
import { AggregatePnl, PnlSnapshot, TradeTime, WalletPnlRecord } from '../types/wallets';
import { RsiAlertKey, ThresholdKey } from '../utils/alertKeys';
import { logger } from '../utils/logger';

export interface StoreDefaults {
  usdAmount: number;
  alertResetMinutes: number;
  rsiInterval: RsiInterval;
  rsiResetEnabled: boolean;
  trackedToken: string;
  buyThresholds: number[];
  sellThresholds: number[];
  rsiAlerts: RsiAlertKey[];
  wallets: string[];
}

export interface StateSnapshot {
  usdAmount: number;
  alertResetMinutes: number;
  trackedToken: string;
  buyThresholds: PriceThreshold[];
  sellThresholds: PriceThreshold[];
  priceHistory: PriceSample[];
  wallets: string[];
  rsiConfig: RsiConfig;
  rsiAlerts: RsiAlert[];
  pnl: PnlSnapshot | null;
}

interface SettingsRow {
  usd_amount: number;
  alert_reset_minutes: number;
  rsi_interval: string;
  rsi_reset_enabled: number;
  tracked_token: string;
}

interface SampleRow {
  timestamp: number;
  buy_price: number;
  sell_price: number;
}

interface ThresholdRow {
  side: ThresholdSide;
  value: number;
  last_triggered_at: number | null;
}

interface RsiAlertRow {
  direction: 'above' | 'below';
  threshold: number;
  triggered: number;
  last_triggered_at: number | null;
}

interface WalletPnlRow {
  address: string;
  holding: number;
  realized: number;
  unrealized: number;
  current_value: number;
  cost_basis: number;
  last_trade_time: TradeTime;
  fetched_at: number;
}

interface SnapshotRow {
  run_at: number;
  holding: number;
  realized: number;
  unrealized: number;
  current_value: number;
  cost_basis: number;
  last_trade_time: number | null;
  failed_wallets: string;
  stale_wallets: string;
}

function parseAddressList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Durable home of every piece of monitor state. All access is synchronous
 * against SQLite, and every compound read-modify-write goes through
 * {@link StateStore.runExclusive}, so no other reader or writer on the event
 * loop can observe or interleave with a half-applied change.
 */
export class StateStore {
  private readonly db: Database.Database;
  private readonly historyLimit: number;

  constructor(db: Database.Database, defaults: StoreDefaults, historyLimit: number = PRICE_HISTORY_LIMIT) {
    this.db = db;
    this.historyLimit = historyLimit;
    this.seed(defaults);
  }

  private seed(defaults: StoreDefaults): void {
    this.runExclusive(() => {
      const existing = this.db.prepare<[], { id: number }>('SELECT id FROM settings WHERE id = 1').get();
      if (existing) {
        const token = this.getTrackedToken();
        if (token !== defaults.trackedToken) {
          logger.warn('Tracked token changed since last run, clearing token-specific state', {
            previous: token,
            current: defaults.trackedToken
          });
          this.db.prepare('UPDATE settings SET tracked_token = ? WHERE id = 1').run(defaults.trackedToken);
          this.db.prepare('DELETE FROM price_samples').run();
          this.db.prepare('DELETE FROM wallet_pnl').run();
          this.db.prepare('DELETE FROM pnl_snapshot').run();
        }
        return;
      }

      this.db.prepare(`
        INSERT INTO settings (id, usd_amount, alert_reset_minutes, rsi_interval, rsi_reset_enabled, tracked_token)
        VALUES (1, ?, ?, ?, ?, ?)
      `).run(
        defaults.usdAmount,
        defaults.alertResetMinutes,
        defaults.rsiInterval,
        defaults.rsiResetEnabled ? 1 : 0,
        defaults.trackedToken
      );

      for (const value of defaults.buyThresholds) {
        this.addThreshold(ThresholdKey.of('buy', value));
      }
      for (const value of defaults.sellThresholds) {
        this.addThreshold(ThresholdKey.of('sell', value));
      }
      for (const key of defaults.rsiAlerts) {
        this.addRsiAlert(key);
      }
      for (const address of defaults.wallets) {
        this.addWallet(address);
      }

      logger.info('State store seeded from configuration defaults');
    });
  }

  /** Runs `fn` as one SQLite transaction; nested calls become savepoints. */
  runExclusive<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private getSettings(): SettingsRow {
    const row = this.db.prepare<[], SettingsRow>(
      'SELECT usd_amount, alert_reset_minutes, rsi_interval, rsi_reset_enabled, tracked_token FROM settings WHERE id = 1'
    ).get();
    if (!row) {
      throw new Error('State store settings row is missing');
    }
    return row;
  }

  getUsdAmount(): number {
    return this.getSettings().usd_amount;
  }

  /** Changing the notional invalidates the chart, so history is cleared with it. */
  setUsdAmount(amount: number): void {
    this.runExclusive(() => {
      this.db.prepare('UPDATE settings SET usd_amount = ? WHERE id = 1').run(amount);
      this.db.prepare('DELETE FROM price_samples').run();
    });
  }

  getAlertResetMinutes(): number {
    return this.getSettings().alert_reset_minutes;
  }

  setAlertResetMinutes(minutes: number): void {
    this.db.prepare('UPDATE settings SET alert_reset_minutes = ? WHERE id = 1').run(minutes);
  }

  getTrackedToken(): string {
    return this.getSettings().tracked_token;
  }

  getPriceHistory(): PriceSample[] {
    return this.db.prepare<[], SampleRow>(
      'SELECT timestamp, buy_price, sell_price FROM price_samples ORDER BY id ASC'
    ).all().map(row => ({
      timestamp: row.timestamp,
      buyPrice: row.buy_price,
      sellPrice: row.sell_price
    }));
  }

  appendPriceSample(sample: PriceSample): void {
    this.runExclusive(() => {
      this.db.prepare('INSERT INTO price_samples (timestamp, buy_price, sell_price) VALUES (?, ?, ?)')
        .run(sample.timestamp, sample.buyPrice, sample.sellPrice);
      this.db.prepare(`
        DELETE FROM price_samples
        WHERE id NOT IN (SELECT id FROM price_samples ORDER BY id DESC LIMIT ?)
      `).run(this.historyLimit);
    });
  }

  getThresholds(side?: ThresholdSide): PriceThreshold[] {
    const rows = side
      ? this.db.prepare<[string], ThresholdRow>(
        'SELECT side, value, last_triggered_at FROM price_thresholds WHERE side = ? ORDER BY value ASC'
      ).all(side)
      : this.db.prepare<[], ThresholdRow>(
        'SELECT side, value, last_triggered_at FROM price_thresholds ORDER BY side ASC, value ASC'
      ).all();

    return rows.map(row => ({
      side: row.side,
      value: row.value,
      lastTriggeredAt: row.last_triggered_at
    }));
  }

  /** Returns false when the key already exists. */
  addThreshold(key: ThresholdKey): boolean {
    const result = this.db.prepare(
      'INSERT OR IGNORE INTO price_thresholds (side, value_key, value, last_triggered_at) VALUES (?, ?, ?, NULL)'
    ).run(key.side, key.valueKey, key.value);
    return result.changes > 0;
  }

  removeThreshold(key: ThresholdKey): boolean {
    const result = this.db.prepare('DELETE FROM price_thresholds WHERE side = ? AND value_key = ?')
      .run(key.side, key.valueKey);
    return result.changes > 0;
  }

  /** Clears the trigger time; returns false when no such threshold exists. */
  resetThreshold(key: ThresholdKey): boolean {
    const result = this.db.prepare(
      'UPDATE price_thresholds SET last_triggered_at = NULL WHERE side = ? AND value_key = ?'
    ).run(key.side, key.valueKey);
    return result.changes > 0;
  }

  markThresholdTriggered(key: ThresholdKey, at: number): void {
    this.db.prepare('UPDATE price_thresholds SET last_triggered_at = ? WHERE side = ? AND value_key = ?')
      .run(at, key.side, key.valueKey);
  }

  getRsiConfig(): RsiConfig {
    const settings = this.getSettings();
    const interval = settings.rsi_interval;
    return {
      interval: isRsiInterval(interval) ? interval : '1s',
      resetEnabled: settings.rsi_reset_enabled === 1
    };
  }

  /** Returns true when the interval actually changed. */
  setRsiInterval(interval: RsiInterval): boolean {
    return this.runExclusive(() => {
      if (this.getRsiConfig().interval === interval) {
        return false;
      }
      this.db.prepare('UPDATE settings SET rsi_interval = ? WHERE id = 1').run(interval);
      return true;
    });
  }

  setRsiResetEnabled(enabled: boolean): void {
    this.db.prepare('UPDATE settings SET rsi_reset_enabled = ? WHERE id = 1').run(enabled ? 1 : 0);
  }

  getRsiAlerts(): RsiAlert[] {
    return this.db.prepare<[], RsiAlertRow>(
      'SELECT direction, threshold, triggered, last_triggered_at FROM rsi_alerts ORDER BY direction ASC, threshold ASC'
    ).all().map(row => ({
      direction: row.direction,
      threshold: row.threshold,
      triggered: row.triggered === 1,
      lastTriggeredAt: row.last_triggered_at
    }));
  }

  addRsiAlert(key: RsiAlertKey): boolean {
    const result = this.db.prepare(
      'INSERT OR IGNORE INTO rsi_alerts (direction, threshold_key, threshold, triggered, last_triggered_at) VALUES (?, ?, ?, 0, NULL)'
    ).run(key.direction, key.thresholdKey, key.threshold);
    return result.changes > 0;
  }

  removeRsiAlert(key: RsiAlertKey): boolean {
    const result = this.db.prepare('DELETE FROM rsi_alerts WHERE direction = ? AND threshold_key = ?')
      .run(key.direction, key.thresholdKey);
    return result.changes > 0;
  }

  resetRsiAlert(key: RsiAlertKey): boolean {
    const result = this.db.prepare(
      'UPDATE rsi_alerts SET triggered = 0 WHERE direction = ? AND threshold_key = ?'
    ).run(key.direction, key.thresholdKey);
    return result.changes > 0;
  }

  setRsiAlertState(key: RsiAlertKey, triggered: boolean, lastTriggeredAt: number | null): void {
    this.db.prepare(
      'UPDATE rsi_alerts SET triggered = ?, last_triggered_at = ? WHERE direction = ? AND threshold_key = ?'
    ).run(triggered ? 1 : 0, lastTriggeredAt, key.direction, key.thresholdKey);
  }

  getWallets(): string[] {
    return this.db.prepare<[], { address: string }>('SELECT address FROM wallets ORDER BY position ASC')
      .all()
      .map(row => row.address);
  }

  /** Returns false for an address that is already tracked. */
  addWallet(address: string, addedAt: number = Date.now()): boolean {
    const result = this.db.prepare('INSERT OR IGNORE INTO wallets (address, added_at) VALUES (?, ?)')
      .run(address, addedAt);
    return result.changes > 0;
  }

  getWalletPnlRecords(): WalletPnlRecord[] {
    return this.db.prepare<[], WalletPnlRow>(`
      SELECT p.address, p.holding, p.realized, p.unrealized, p.current_value, p.cost_basis,
             p.last_trade_time, p.fetched_at
      FROM wallet_pnl p
      JOIN wallets w ON w.address = p.address
      ORDER BY w.position ASC
    `).all().map(row => ({
      address: row.address,
      holding: row.holding,
      realized: row.realized,
      unrealized: row.unrealized,
      currentValue: row.current_value,
      costBasis: row.cost_basis,
      lastTradeTime: row.last_trade_time,
      fetchedAt: row.fetched_at
    }));
  }

  getPnlSnapshot(): PnlSnapshot | null {
    return this.runExclusive(() => {
      const row = this.db.prepare<[], SnapshotRow>(`
        SELECT run_at, holding, realized, unrealized, current_value, cost_basis, last_trade_time,
               failed_wallets, stale_wallets
        FROM pnl_snapshot WHERE id = 1
      `).get();
      if (!row) {
        return null;
      }

      const staleWallets = parseAddressList(row.stale_wallets);
      const aggregate: AggregatePnl = {
        holding: row.holding,
        realized: row.realized,
        unrealized: row.unrealized,
        currentValue: row.current_value,
        costBasis: row.cost_basis,
        lastTradeTime: row.last_trade_time,
        failedWallets: parseAddressList(row.failed_wallets),
        staleWallets,
        staleCount: staleWallets.length
      };

      return { runAt: row.run_at, wallets: this.getWalletPnlRecords(), aggregate };
    });
  }

  /** Writes every wallet record and the aggregate in one transaction. */
  savePnlSnapshot(snapshot: PnlSnapshot): void {
    const upsertRecord = this.db.prepare(`
      INSERT INTO wallet_pnl (address, holding, realized, unrealized, current_value, cost_basis, last_trade_time, fetched_at)
      VALUES (@address, @holding, @realized, @unrealized, @currentValue, @costBasis, @lastTradeTime, @fetchedAt)
      ON CONFLICT(address) DO UPDATE SET
        holding = excluded.holding, realized = excluded.realized, unrealized = excluded.unrealized,
        current_value = excluded.current_value, cost_basis = excluded.cost_basis,
        last_trade_time = excluded.last_trade_time, fetched_at = excluded.fetched_at
    `);

    this.runExclusive(() => {
      for (const record of snapshot.wallets) {
        upsertRecord.run(record);
      }

      const { aggregate } = snapshot;
      this.db.prepare(`
        INSERT OR REPLACE INTO pnl_snapshot (
          id, run_at, holding, realized, unrealized, current_value, cost_basis, last_trade_time,
          failed_wallets, stale_wallets
        ) VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        snapshot.runAt,
        aggregate.holding,
        aggregate.realized,
        aggregate.unrealized,
        aggregate.currentValue,
        aggregate.costBasis,
        aggregate.lastTradeTime,
        JSON.stringify(aggregate.failedWallets),
        JSON.stringify(aggregate.staleWallets)
      );
    });
  }

  getSnapshot(): StateSnapshot {
    return this.runExclusive(() => ({
      usdAmount: this.getUsdAmount(),
      alertResetMinutes: this.getAlertResetMinutes(),
      trackedToken: this.getTrackedToken(),
      buyThresholds: this.getThresholds('buy'),
      sellThresholds: this.getThresholds('sell'),
      priceHistory: this.getPriceHistory(),
      wallets: this.getWallets(),
      rsiConfig: this.getRsiConfig(),
      rsiAlerts: this.getRsiAlerts(),
      pnl: this.getPnlSnapshot()
    }));
  }
}
