import { THRESHOLD_DECIMALS } from '../types/prices';

export class Formatters {
  static formatPrice(price: number, decimals: number = THRESHOLD_DECIMALS): string {
    return `$${price.toFixed(decimals)}`;
  }

  static formatUsd(value: number): string {
    const sign = value < 0 ? '-' : '';
    return `${sign}$${Math.abs(value).toFixed(2)}`;
  }

  static formatTokenAmount(amount: number): string {
    if (amount >= 1_000_000_000) {
      return `${(amount / 1_000_000_000).toFixed(2)}B`;
    }
    if (amount >= 1_000_000) {
      return `${(amount / 1_000_000).toFixed(2)}M`;
    }
    if (amount >= 1_000) {
      return `${(amount / 1_000).toFixed(2)}K`;
    }
    return amount.toFixed(2);
  }

  /** Renders an epoch-ms instant in the given IANA zone, e.g. `2024-03-01 14:05:09 UTC`. */
  static formatTimestamp(timestampMs: number, timezone: string = 'UTC'): string {
    const parts = new Intl.DateTimeFormat('en-CA', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    }).formatToParts(new Date(timestampMs));

    const part = (type: Intl.DateTimeFormatPartTypes): string =>
      parts.find(entry => entry.type === type)?.value ?? '';

    return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')} ${timezone}`;
  }

  static isValidTimeZone(timezone: string): boolean {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: timezone });
      return true;
    } catch {
      return false;
    }
  }

  /** HTTP header values must be ASCII; other characters are dropped. */
  static toHeaderSafe(text: string): string {
    return text.replace(/[^\x20-\x7E]/g, '');
  }
}
