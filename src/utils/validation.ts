import { PriceSample } from '../types/prices';
import { logger } from './logger';

export interface ValidationRule<T> {
  name: string;
  validate(data: T): boolean;
  getMessage(data: T): string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

const BASE58_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

export class SampleValidator {
  private rules: ValidationRule<PriceSample>[] = [];

  constructor() {
    this.setupDefaultRules();
  }

  private setupDefaultRules(): void {
    this.rules = [
      {
        name: 'positive_buy_price',
        validate: (data) => isPositiveFinite(data.buyPrice),
        getMessage: (data) => `Invalid buy price: ${data.buyPrice}`
      },
      {
        name: 'positive_sell_price',
        validate: (data) => isPositiveFinite(data.sellPrice),
        getMessage: (data) => `Invalid sell price: ${data.sellPrice}`
      },
      {
        name: 'valid_timestamp',
        validate: (data) => Number.isInteger(data.timestamp) && data.timestamp > 0,
        getMessage: (data) => `Invalid sample timestamp: ${data.timestamp}`
      }
    ];
  }

  validateSample(data: PriceSample): ValidationResult {
    const errors: string[] = [];

    for (const rule of this.rules) {
      if (!rule.validate(data)) {
        errors.push(rule.getMessage(data));
      }
    }

    const isValid = errors.length === 0;

    if (!isValid) {
      logger.warn('Price sample failed validation', { errors });
    }

    return { isValid, errors };
  }
}

export function createSampleValidator(): SampleValidator {
  return new SampleValidator();
}

export function isValidWalletAddress(address: string): boolean {
  return BASE58_ADDRESS.test(address);
}

/** Splits a comma separated list, dropping blanks. */
export function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
}

/**
 * Parses a comma separated list of positive numbers. Entries that do not parse
 * are skipped and reported through `onInvalid`.
 */
export function parseNumberList(raw: string | undefined, onInvalid?: (entry: string) => void): number[] {
  const values: number[] = [];
  for (const entry of splitList(raw)) {
    const value = Number(entry);
    if (isPositiveFinite(value)) {
      values.push(value);
    } else {
      onInvalid?.(entry);
    }
  }
  return values;
}
