export type ThresholdSide = 'buy' | 'sell';

export const THRESHOLD_SIDES: readonly ThresholdSide[] = ['buy', 'sell'];

/** Price thresholds are compared and keyed at this many decimal places. */
export const THRESHOLD_DECIMALS = 8;

export const PRICE_HISTORY_LIMIT = 100;

export interface PriceSample {
  timestamp: number;
  buyPrice: number;
  sellPrice: number;
}

export interface PriceThreshold {
  side: ThresholdSide;
  value: number;
  lastTriggeredAt: number | null;
}

export interface QuoteRequest {
  inputMint: string;
  outputMint: string;
  /** Raw integer amount in the input mint's smallest unit. */
  amount: number;
}

export interface SwapQuote {
  inAmount: number;
  outAmount: number;
  priceImpactPct: number;
}

export interface PriceQuoter {
  quote(request: QuoteRequest): Promise<SwapQuote>;
}

export function isThresholdSide(value: string): value is ThresholdSide {
  return THRESHOLD_SIDES.some(side => side === value);
}
