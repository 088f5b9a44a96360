import { AlertEventBus, DeliveryOutcome } from '../events/alertBus';
import { PriceSample, PriceThreshold, ThresholdSide } from '../types/prices';
import { ThresholdKey } from '../utils/alertKeys';
import { Clock, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';
import { StateStore } from './stateStore';

export interface FiredThreshold {
  side: ThresholdSide;
  threshold: number;
  price: number;
  triggeredAt: number;
}

export interface EvaluationResult {
  fired: FiredThreshold[];
  /** Resolves once every notification attempt has settled; never rejects. */
  deliveries: Promise<DeliveryOutcome[]>;
}

/**
 * Cooldown rule. An untriggered threshold always fires. With a reset window of
 * 0 minutes a triggered threshold stays silent until reset manually.
 */
export function shouldFire(lastTriggeredAt: number | null, resetMinutes: number, now: number): boolean {
  if (lastTriggeredAt === null) {
    return true;
  }
  return resetMinutes > 0 && now - lastTriggeredAt >= resetMinutes * 60000;
}

export function conditionHolds(threshold: PriceThreshold, sample: PriceSample): boolean {
  return threshold.side === 'buy'
    ? sample.buyPrice <= threshold.value
    : sample.sellPrice >= threshold.value;
}

export class ThresholdAlertEngine {
  constructor(
    private readonly store: StateStore,
    private readonly alertBus: AlertEventBus,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Evaluates and marks every qualifying threshold in one store transaction,
   * then hands the notifications to the bus. The returned `fired` list is the
   * committed state change regardless of how delivery turns out.
   */
  evaluate(sample: PriceSample): EvaluationResult {
    const now = this.clock.now();

    const fired = this.store.runExclusive(() => {
      const resetMinutes = this.store.getAlertResetMinutes();
      const hits: FiredThreshold[] = [];

      for (const threshold of this.store.getThresholds()) {
        if (!conditionHolds(threshold, sample)) continue;
        if (!shouldFire(threshold.lastTriggeredAt, resetMinutes, now)) continue;

        this.store.markThresholdTriggered(ThresholdKey.of(threshold.side, threshold.value), now);
        hits.push({
          side: threshold.side,
          threshold: threshold.value,
          price: threshold.side === 'buy' ? sample.buyPrice : sample.sellPrice,
          triggeredAt: now
        });
      }

      return hits;
    });

    if (fired.length > 0) {
      logger.info(`Price thresholds fired: ${fired.length}`, {
        thresholds: fired.map(hit => `${hit.side}:${hit.threshold}`)
      });
    }

    const deliveries = Promise.all(
      fired.map(hit => this.alertBus.emitPriceAlert({ side: hit.side, price: hit.price, threshold: hit.threshold }))
    ).then(results => results.flat());

    return { fired, deliveries };
  }
}
