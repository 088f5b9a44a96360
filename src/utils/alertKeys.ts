import { ThresholdSide, THRESHOLD_DECIMALS, isThresholdSide } from '../types/prices';
import { RsiDirection, isRsiDirection } from '../types/rsi';
import { invalidInput } from './errorHandler';

const RSI_THRESHOLD_DECIMALS = 2;

export function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

/**
 * Identity of a price threshold: its side plus the value rounded to the
 * threshold precision. Two keys built from 0.00135 and 0.001350000001 are the
 * same key.
 */
export class ThresholdKey {
  private constructor(
    readonly side: ThresholdSide,
    readonly value: number
  ) {}

  static of(side: string, value: number): ThresholdKey {
    if (!isThresholdSide(side)) {
      throw invalidInput(`Invalid threshold side: ${side}`, 'threshold_key');
    }
    if (!Number.isFinite(value) || value <= 0) {
      throw invalidInput(`Threshold value must be a positive number, got ${value}`, 'threshold_key');
    }
    const rounded = roundTo(value, THRESHOLD_DECIMALS);
    if (rounded <= 0) {
      throw invalidInput(`Threshold value ${value} rounds to zero`, 'threshold_key');
    }
    return new ThresholdKey(side, rounded);
  }

  get valueKey(): string {
    return this.value.toFixed(THRESHOLD_DECIMALS);
  }

  get id(): string {
    return `${this.side}:${this.valueKey}`;
  }
}

export class RsiAlertKey {
  private constructor(
    readonly direction: RsiDirection,
    readonly threshold: number
  ) {}

  static of(direction: string, threshold: number): RsiAlertKey {
    if (!isRsiDirection(direction)) {
      throw invalidInput(`Invalid RSI alert direction: ${direction}`, 'rsi_alert_key');
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
      throw invalidInput(`RSI threshold must be between 0 and 100, got ${threshold}`, 'rsi_alert_key');
    }
    return new RsiAlertKey(direction, roundTo(threshold, RSI_THRESHOLD_DECIMALS));
  }

  /** Accepts the `direction:threshold` form, e.g. `above:70` or `below:30.5`. */
  static parse(entry: string): RsiAlertKey {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(':');
    if (separator === -1) {
      throw invalidInput(`Invalid RSI alert format: ${entry}`, 'rsi_alert_key');
    }
    const direction = trimmed.slice(0, separator).trim().toLowerCase();
    const rawThreshold = trimmed.slice(separator + 1).trim();
    const threshold = rawThreshold === '' ? NaN : Number(rawThreshold);
    return RsiAlertKey.of(direction, threshold);
  }

  get thresholdKey(): string {
    return this.threshold.toFixed(RSI_THRESHOLD_DECIMALS);
  }

  get id(): string {
    return `${this.direction}:${this.thresholdKey}`;
  }
}
