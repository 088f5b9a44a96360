import { AlertEventBus, DeliveryOutcome } from '../events/alertBus';
import { CandleSource, RSI_INTERVAL_MS, RsiAlert, RsiCandle, RsiInterval, RsiStatus } from '../types/rsi';
import { RsiAlertKey } from '../utils/alertKeys';
import { Clock, systemClock } from '../utils/clock';
import { globalErrorHandler } from '../utils/errorHandler';
import { RSI_PERIOD, latestWilderRsi } from '../utils/indicators';
import { logger } from '../utils/logger';
import { StateStore } from './stateStore';

export type RsiTransition = 'trigger' | 'rearm' | null;

export interface FiredRsiAlert {
  direction: RsiAlert['direction'];
  threshold: number;
  rsi: number;
}

export interface RsiRefreshResult {
  status: RsiStatus;
  fired: FiredRsiAlert[];
  deliveries: Promise<DeliveryOutcome[]>;
  /** True when the interval changed while the fetch was in flight. */
  discarded: boolean;
}

const NO_DELIVERIES: Promise<DeliveryOutcome[]> = Promise.resolve([]);

/**
 * "above" triggers at rsi ≥ threshold and, with auto reset, re-arms once
 * rsi < threshold. "below" mirrors it.
 */
export function rsiTransition(alert: RsiAlert, rsi: number, resetEnabled: boolean): RsiTransition {
  const crossed = alert.direction === 'above' ? rsi >= alert.threshold : rsi <= alert.threshold;

  if (!alert.triggered) {
    return crossed ? 'trigger' : null;
  }
  return resetEnabled && !crossed ? 'rearm' : null;
}

/** Drops candles whose interval has not finished yet. */
export function closedCandles(candles: readonly RsiCandle[], interval: RsiInterval, now: number): RsiCandle[] {
  const intervalMs = RSI_INTERVAL_MS[interval];
  return candles.filter(candle => candle.openTime + intervalMs <= now);
}

export class RsiEngine {
  private status: RsiStatus;
  private generation = 0;

  constructor(
    private readonly store: StateStore,
    private readonly alertBus: AlertEventBus,
    private readonly source: CandleSource | null,
    private readonly token: string,
    private readonly clock: Clock = systemClock
  ) {
    this.status = source
      ? { state: 'unavailable', reason: 'not_started', interval: store.getRsiConfig().interval }
      : { state: 'disabled' };
  }

  isEnabled(): boolean {
    return this.source !== null;
  }

  getStatus(): RsiStatus {
    return this.status;
  }

  /**
   * Discards the published value. Any refresh already in flight for the old
   * interval will be ignored when it completes.
   */
  onIntervalChanged(interval: RsiInterval): void {
    this.generation += 1;
    if (this.source) {
      this.status = { state: 'unavailable', reason: 'rebuilding', interval };
    }
    logger.info(`RSI interval switched to ${interval}, rebuilding series`);
  }

  private result(discarded: boolean): RsiRefreshResult {
    return { status: this.status, fired: [], deliveries: NO_DELIVERIES, discarded };
  }

  async refresh(): Promise<RsiRefreshResult> {
    if (!this.source) {
      return this.result(false);
    }

    const generation = this.generation;
    const interval = this.store.getRsiConfig().interval;

    let candles: RsiCandle[];
    try {
      candles = await this.source.getCandles(this.token, interval);
    } catch (error) {
      if (generation !== this.generation) {
        return this.result(true);
      }
      globalErrorHandler.handleError(error, { operation: 'rsi_refresh', collaborator: 'solanatracker' });
      this.status = { state: 'unavailable', reason: 'upstream_error', interval };
      return this.result(false);
    }

    if (generation !== this.generation || this.store.getRsiConfig().interval !== interval) {
      logger.debug('Discarding RSI refresh started under a previous interval');
      return this.result(true);
    }

    const now = this.clock.now();
    const closed = closedCandles(candles, interval, now);
    const rsi = latestWilderRsi(closed.map(candle => candle.close), RSI_PERIOD);
    const last = closed[closed.length - 1];

    if (rsi === null || last === undefined) {
      this.status = { state: 'unavailable', reason: 'insufficient_data', interval };
      logger.debug(`Not enough closed ${interval} candles for RSI: ${closed.length}`);
      return this.result(false);
    }

    this.status = {
      state: 'ready',
      value: rsi,
      candleTime: last.openTime + RSI_INTERVAL_MS[interval],
      interval,
      computedAt: now
    };

    const fired = this.applyAlerts(rsi, now);
    const deliveries = Promise.all(
      fired.map(hit => this.alertBus.emitRsiAlert({ ...hit, interval }))
    ).then(results => results.flat());

    return { status: this.status, fired, deliveries, discarded: false };
  }

  private applyAlerts(rsi: number, now: number): FiredRsiAlert[] {
    return this.store.runExclusive(() => {
      const { resetEnabled } = this.store.getRsiConfig();
      const fired: FiredRsiAlert[] = [];

      for (const alert of this.store.getRsiAlerts()) {
        const transition = rsiTransition(alert, rsi, resetEnabled);
        if (transition === null) continue;

        const key = RsiAlertKey.of(alert.direction, alert.threshold);
        if (transition === 'trigger') {
          this.store.setRsiAlertState(key, true, now);
          fired.push({ direction: alert.direction, threshold: alert.threshold, rsi });
          logger.info(`RSI alert ${key.id} triggered at ${rsi}`);
        } else {
          this.store.setRsiAlertState(key, false, alert.lastTriggeredAt);
          logger.info(`RSI alert ${key.id} re-armed at ${rsi}`);
        }
      }

      return fired;
    });
  }
}
