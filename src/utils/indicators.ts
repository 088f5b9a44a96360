import { roundTo } from './alertKeys';

export const RSI_PERIOD = 14;

function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return 100;
  }
  if (avgGain === 0) {
    return 0;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Wilder RSI over a close series. The first value is seeded with the simple
 * average of the first `period` changes, then smoothed as
 * `avg = (prev * (period - 1) + current) / period`.
 *
 * Returns one value per close from index `period` onward, unrounded.
 */
export function computeWilderRsi(closes: readonly number[], period: number = RSI_PERIOD): number[] {
  if (closes.length < period + 1) {
    return [];
  }

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const current = closes[i] ?? 0;
    const previous = closes[i - 1] ?? 0;
    const change = current - previous;
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  let avgGain = gains.slice(0, period).reduce((sum, g) => sum + g, 0) / period;
  let avgLoss = losses.slice(0, period).reduce((sum, l) => sum + l, 0) / period;
  const values = [rsiFromAverages(avgGain, avgLoss)];

  for (let i = period; i < gains.length; i++) {
    avgGain = (avgGain * (period - 1) + (gains[i] ?? 0)) / period;
    avgLoss = (avgLoss * (period - 1) + (losses[i] ?? 0)) / period;
    values.push(rsiFromAverages(avgGain, avgLoss));
  }

  return values;
}

/** Latest RSI rounded to 2 decimals, or null with fewer than `period + 1` closes. */
export function latestWilderRsi(closes: readonly number[], period: number = RSI_PERIOD): number | null {
  const values = computeWilderRsi(closes, period);
  const last = values[values.length - 1];
  return last === undefined ? null : roundTo(last, 2);
}
