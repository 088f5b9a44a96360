import { reportDeliveries } from '../events/alertBus';
import { PriceSample, ThresholdSide, isThresholdSide } from '../types/prices';
import { RsiConfig, RsiStatus, isRsiInterval } from '../types/rsi';
import { PnlSnapshot } from '../types/wallets';
import { RsiAlertKey, ThresholdKey } from '../utils/alertKeys';
import { Clock, systemClock } from '../utils/clock';
import { invalidInput } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';
import { isValidWalletAddress } from '../utils/validation';
import { RsiEngine } from './rsiEngine';
import { StateStore } from './stateStore';
import { shouldFire } from './thresholdAlerts';
import { PnlRefreshResult, WalletPnlAggregator } from './walletPnl';

export interface ThresholdView {
  value: number;
  lastTriggeredAt: number | null;
  /** Whether the threshold would fire if its condition held now. */
  active: boolean;
}

export interface RsiAlertView {
  key: string;
  direction: RsiAlertKey['direction'];
  threshold: number;
  triggered: boolean;
  lastTriggeredAt: number | null;
}

export interface ControlState {
  usdAmount: number;
  alertResetMinutes: number;
  trackedToken: string;
  buyThresholds: ThresholdView[];
  sellThresholds: ThresholdView[];
  priceHistory: PriceSample[];
  wallets: string[];
  rsi: {
    config: RsiConfig;
    alerts: RsiAlertView[];
    status: RsiStatus;
  };
  pnl: PnlSnapshot | null;
}

export interface MutationResult {
  changed: boolean;
}

export interface AddResult<T> {
  added: T[];
  existing: T[];
}

export type RsiAlertInput = string | { direction: string; threshold: number };

function toRsiKey(input: RsiAlertInput): RsiAlertKey {
  return typeof input === 'string' ? RsiAlertKey.parse(input) : RsiAlertKey.of(input.direction, input.threshold);
}

function toSide(side: string): ThresholdSide {
  if (!isThresholdSide(side)) {
    throw invalidInput(`Invalid threshold side: ${side}`, 'threshold_side');
  }
  return side;
}

/**
 * Operations offered to an outer API or UI layer. Every input is validated
 * before the store is touched, so a rejected call leaves state unchanged.
 */
export class ControlService {
  constructor(
    private readonly store: StateStore,
    private readonly rsiEngine: RsiEngine,
    private readonly aggregator: WalletPnlAggregator,
    private readonly clock: Clock = systemClock
  ) {}

  getState(): ControlState {
    const snapshot = this.store.getSnapshot();
    const now = this.clock.now();
    const toView = (threshold: { value: number; lastTriggeredAt: number | null }): ThresholdView => ({
      value: threshold.value,
      lastTriggeredAt: threshold.lastTriggeredAt,
      active: shouldFire(threshold.lastTriggeredAt, snapshot.alertResetMinutes, now)
    });

    return {
      usdAmount: snapshot.usdAmount,
      alertResetMinutes: snapshot.alertResetMinutes,
      trackedToken: snapshot.trackedToken,
      buyThresholds: snapshot.buyThresholds.map(toView),
      sellThresholds: snapshot.sellThresholds.map(toView),
      priceHistory: snapshot.priceHistory,
      wallets: snapshot.wallets,
      rsi: {
        config: snapshot.rsiConfig,
        alerts: snapshot.rsiAlerts.map(alert => ({
          key: RsiAlertKey.of(alert.direction, alert.threshold).id,
          ...alert
        })),
        status: this.rsiEngine.getStatus()
      },
      pnl: snapshot.pnl
    };
  }

  setUsdAmount(amount: number): void {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw invalidInput(`USD amount must be greater than 0, got ${amount}`, 'set_usd_amount');
    }
    this.store.setUsdAmount(amount);
    logger.info(`USD amount set to ${amount}, price history cleared`);
  }

  setAlertResetMinutes(minutes: number): void {
    if (!Number.isInteger(minutes) || minutes < 0) {
      throw invalidInput(`Reset minutes must be a non-negative integer, got ${minutes}`, 'set_alert_reset_minutes');
    }
    this.store.setAlertResetMinutes(minutes);
    logger.info(`Alert reset window set to ${minutes} minute(s)`);
  }

  addThresholds(side: string, values: number[]): AddResult<number> {
    const thresholdSide = toSide(side);
    const keys = values.map(value => ThresholdKey.of(thresholdSide, value));

    return this.store.runExclusive(() => {
      const result: AddResult<number> = { added: [], existing: [] };
      for (const key of keys) {
        if (this.store.addThreshold(key)) {
          result.added.push(key.value);
        } else {
          result.existing.push(key.value);
        }
      }
      return result;
    });
  }

  removeThreshold(side: string, value: number): MutationResult {
    return { changed: this.store.removeThreshold(ThresholdKey.of(toSide(side), value)) };
  }

  resetThreshold(side: string, value: number): MutationResult {
    return { changed: this.store.resetThreshold(ThresholdKey.of(toSide(side), value)) };
  }

  addWallet(address: string): MutationResult {
    const trimmed = address.trim();
    if (!isValidWalletAddress(trimmed)) {
      throw invalidInput(`Invalid wallet address: ${address}`, 'add_wallet');
    }
    return { changed: this.store.addWallet(trimmed, this.clock.now()) };
  }

  setRsiInterval(interval: string): MutationResult {
    if (!isRsiInterval(interval)) {
      throw invalidInput(`Unsupported RSI interval: ${interval}`, 'set_rsi_interval');
    }
    const changed = this.store.setRsiInterval(interval);
    if (changed) {
      this.rsiEngine.onIntervalChanged(interval);
      this.rsiEngine.refresh()
        .then(result => reportDeliveries('RSI', result.deliveries))
        .catch((error: unknown) => {
          logger.error('RSI refresh after interval change failed:', error);
        });
    }
    return { changed };
  }

  setRsiResetEnabled(enabled: boolean): void {
    this.store.setRsiResetEnabled(enabled);
    logger.info(`RSI auto reset ${enabled ? 'enabled' : 'disabled'}`);
  }

  addRsiAlerts(entries: RsiAlertInput[]): AddResult<string> {
    const keys = entries.map(toRsiKey);

    return this.store.runExclusive(() => {
      const result: AddResult<string> = { added: [], existing: [] };
      for (const key of keys) {
        if (this.store.addRsiAlert(key)) {
          result.added.push(key.id);
        } else {
          result.existing.push(key.id);
        }
      }
      return result;
    });
  }

  removeRsiAlert(key: RsiAlertInput): MutationResult {
    return { changed: this.store.removeRsiAlert(toRsiKey(key)) };
  }

  resetRsiAlert(key: RsiAlertInput): MutationResult {
    return { changed: this.store.resetRsiAlert(toRsiKey(key)) };
  }

  refreshWalletPnl(): Promise<PnlRefreshResult> {
    return this.aggregator.refresh();
  }

  getWalletPnl(): PnlSnapshot | null {
    return this.aggregator.getSnapshot();
  }

  /** Plain-text summary for chat channels. */
  formatStatusSummary(timezone: string = 'UTC'): string {
    const state = this.getState();
    const latest = state.priceHistory[state.priceHistory.length - 1];
    const lines = [`📊 Notional: ${Formatters.formatUsd(state.usdAmount)}`];

    if (latest) {
      lines.push(
        `Buy: ${Formatters.formatPrice(latest.buyPrice)}  Sell: ${Formatters.formatPrice(latest.sellPrice)}`,
        `Sampled: ${Formatters.formatTimestamp(latest.timestamp, timezone)}`
      );
    } else {
      lines.push('No price samples yet');
    }

    lines.push(`Thresholds: ${state.buyThresholds.length} buy, ${state.sellThresholds.length} sell`);

    const { status } = state.rsi;
    if (status.state === 'ready') {
      lines.push(`RSI (${status.interval}): ${status.value.toFixed(2)}`);
    } else if (status.state === 'unavailable') {
      lines.push(`RSI (${status.interval}): unavailable (${status.reason})`);
    } else {
      lines.push('RSI: disabled');
    }

    if (state.pnl) {
      const { aggregate } = state.pnl;
      lines.push(
        `Wallets: ${state.wallets.length}  Holding: ${Formatters.formatTokenAmount(aggregate.holding)}  Value: ${Formatters.formatUsd(aggregate.currentValue)}`,
        `PnL: realized ${Formatters.formatUsd(aggregate.realized)}, unrealized ${Formatters.formatUsd(aggregate.unrealized)}`
      );
    }

    return lines.join('\n');
  }
}
