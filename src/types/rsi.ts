export type RsiInterval = '1s' | '1m' | '5m' | '15m' | '1h' | '4h';

export const RSI_INTERVALS: readonly RsiInterval[] = ['1s', '1m', '5m', '15m', '1h', '4h'];

export const RSI_INTERVAL_MS: Record<RsiInterval, number> = {
  '1s': 1_000,
  '1m': 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000
};

export type RsiDirection = 'above' | 'below';

export interface RsiCandle {
  openTime: number;
  close: number;
}

export interface RsiAlert {
  direction: RsiDirection;
  threshold: number;
  triggered: boolean;
  lastTriggeredAt: number | null;
}

export interface RsiConfig {
  interval: RsiInterval;
  resetEnabled: boolean;
}

export type RsiUnavailableReason = 'not_started' | 'rebuilding' | 'upstream_error' | 'insufficient_data';

export type RsiStatus =
  | { state: 'disabled' }
  | { state: 'unavailable'; reason: RsiUnavailableReason; interval: RsiInterval }
  | { state: 'ready'; value: number; candleTime: number; interval: RsiInterval; computedAt: number };

export interface CandleSource {
  getCandles(token: string, interval: RsiInterval): Promise<RsiCandle[]>;
}

export function isRsiInterval(value: string): value is RsiInterval {
  return RSI_INTERVALS.some(interval => interval === value);
}

export function isRsiDirection(value: string): value is RsiDirection {
  return value === 'above' || value === 'below';
}
