import { AggregatePnl, PnlSnapshot, PortfolioSource, TradeTime, WalletPnlRecord } from '../types/wallets';
import { Clock, Sleep, sleep as defaultSleep, systemClock } from '../utils/clock';
import { globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { RequestSpacer } from './rateLimiter';
import { StateStore } from './stateStore';

export interface AggregatorOptions {
  spacingMs: number;
  retryBackoffMs: number;
}

const DEFAULT_OPTIONS: AggregatorOptions = {
  spacingMs: 1100,
  retryBackoffMs: 2000
};

export type PnlRefreshResult =
  | { status: 'disabled' }
  | { status: 'completed'; snapshot: PnlSnapshot };

/** Epoch ms, or null when the value is not a usable timestamp. Numbers below 1e12 are seconds. */
export function parseTradeTime(value: TradeTime): number | null {
  if (value === null) return null;

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    return value < 1e12 ? value * 1000 : value;
  }

  const trimmed = value.trim();
  if (trimmed === '') return null;
  const numeric = Number(trimmed);
  if (Number.isFinite(numeric)) {
    return parseTradeTime(numeric);
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Stale when not fetched in this run, or when every figure is zero with no
 * trade history (an empty wallet looks the same as a blank upstream answer).
 */
export function isStaleRecord(record: WalletPnlRecord, runAt: number): boolean {
  if (record.fetchedAt !== runAt) return true;

  const allZero = record.holding === 0
    && record.realized === 0
    && record.unrealized === 0
    && record.currentValue === 0
    && record.costBasis === 0;
  return allZero && parseTradeTime(record.lastTradeTime) === null;
}

export function aggregatePnl(records: WalletPnlRecord[], runAt: number, failedWallets: string[]): AggregatePnl {
  let holding = 0;
  let realized = 0;
  let unrealized = 0;
  let currentValue = 0;
  let weightedCost = 0;
  let weightedHolding = 0;
  let lastTradeTime: number | null = null;
  const staleWallets: string[] = [];

  for (const record of records) {
    holding += record.holding;
    realized += record.realized;
    unrealized += record.unrealized;
    currentValue += record.currentValue;

    if (record.holding > 0) {
      weightedCost += record.costBasis * record.holding;
      weightedHolding += record.holding;
    }

    const tradeTime = parseTradeTime(record.lastTradeTime);
    if (tradeTime !== null && (lastTradeTime === null || tradeTime > lastTradeTime)) {
      lastTradeTime = tradeTime;
    }

    if (isStaleRecord(record, runAt)) {
      staleWallets.push(record.address);
    }
  }

  return {
    holding,
    realized,
    unrealized,
    currentValue,
    costBasis: weightedHolding > 0 ? weightedCost / weightedHolding : 0,
    lastTradeTime,
    failedWallets: [...failedWallets],
    staleWallets,
    staleCount: staleWallets.length
  };
}

/**
 * Refreshes every tracked wallet against the tracked token. Requests are
 * spaced, failures get one delayed retry pass, and wallets that still fail
 * keep their previous record. Concurrent callers share one run.
 */
export class WalletPnlAggregator {
  private inFlight: Promise<PnlRefreshResult> | null = null;
  private readonly options: AggregatorOptions;

  constructor(
    private readonly store: StateStore,
    private readonly source: PortfolioSource | null,
    private readonly token: string,
    private readonly clock: Clock = systemClock,
    private readonly sleep: Sleep = defaultSleep,
    options: Partial<AggregatorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  isEnabled(): boolean {
    return this.source !== null;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  refresh(): Promise<PnlRefreshResult> {
    if (!this.source) {
      return Promise.resolve({ status: 'disabled' });
    }
    if (this.inFlight) {
      logger.debug('Wallet PnL refresh already running, joining it');
      return this.inFlight;
    }

    const source = this.source;
    this.inFlight = this.run(source).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  getSnapshot(): PnlSnapshot | null {
    return this.store.getPnlSnapshot();
  }

  private async run(source: PortfolioSource): Promise<PnlRefreshResult> {
    const runAt = this.clock.now();
    const wallets = this.store.getWallets();
    const previous = new Map(this.store.getWalletPnlRecords().map(record => [record.address, record]));
    const fresh = new Map<string, WalletPnlRecord>();
    const spacer = new RequestSpacer(this.options.spacingMs, this.clock, this.sleep);

    const pass = async (batch: string[]): Promise<string[]> => {
      const failed: string[] = [];
      for (const address of batch) {
        await spacer.wait();
        try {
          const data = await source.getWalletPnl(address, this.token);
          fresh.set(address, { ...data, address, fetchedAt: runAt });
        } catch (error) {
          globalErrorHandler.handleError(error, {
            operation: 'wallet_pnl_refresh',
            collaborator: 'solanatracker',
            wallet: address
          });
          failed.push(address);
        }
      }
      return failed;
    };

    let failed = await pass(wallets);
    if (failed.length > 0) {
      logger.info(`Retrying ${failed.length} wallet(s) after backoff`);
      await this.sleep(this.options.retryBackoffMs);
      failed = await pass(failed);
    }

    const records: WalletPnlRecord[] = [];
    for (const address of wallets) {
      const record = fresh.get(address) ?? previous.get(address);
      if (record) records.push(record);
    }

    const snapshot: PnlSnapshot = {
      runAt,
      wallets: records,
      aggregate: aggregatePnl(records, runAt, failed)
    };
    this.store.savePnlSnapshot(snapshot);

    logger.info('Wallet PnL refresh completed', {
      wallets: wallets.length,
      failed: failed.length,
      stale: snapshot.aggregate.staleCount
    });

    return { status: 'completed', snapshot };
  }
}
