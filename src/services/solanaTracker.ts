import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { CandleSource, RsiCandle, RsiInterval } from '../types/rsi';
import { PortfolioSource, TradeTime, WalletPnlData } from '../types/wallets';
import { CircuitBreaker, ErrorContext, isAppError, toCollaboratorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

const MAX_CANDLES = 2000;

interface ChartResponse {
  oclhv?: unknown;
}

export interface SolanaTrackerOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  circuitBreaker?: CircuitBreaker;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) ? parsed : 0;
}

function tradeTimeField(source: Record<string, unknown>, key: string): TradeTime {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') return value;
  return null;
}

/**
 * Client for the Solana Tracker data API: OCLHV chart candles for the RSI
 * engine and per-wallet token PnL for the aggregator.
 */
export class SolanaTrackerService implements CandleSource, PortfolioSource {
  private readonly client: AxiosInstance;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: SolanaTrackerOptions) {
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker({
      failureThreshold: 5,
      recoveryTimeout: 60000,
      isFailure: (error) => !isAppError(error, 'RATE_LIMITED')
    });
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://data.solanatracker.io',
      timeout: options.timeoutMs ?? 15000,
      adapter: options.adapter,
      headers: {
        'Accept': 'application/json',
        'x-api-key': options.apiKey
      }
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          if (error.response?.status === 429) {
            logger.debug('Solana Tracker rate limit hit');
          } else {
            logger.warn('Solana Tracker API error:', {
              status: error.response?.status,
              message: error.message
            });
          }
        }
        return Promise.reject(error);
      }
    );
  }

  private async request<T>(path: string, params: Record<string, string | boolean>, context: ErrorContext): Promise<T> {
    try {
      const response = await this.client.get<T>(path, { params });
      return response.data;
    } catch (error) {
      throw toCollaboratorError(error, context);
    }
  }

  /**
   * Candles in ascending open time; the last entry may still be forming.
   * Guarded by the circuit breaker; rate limiting does not trip it.
   */
  async getCandles(token: string, interval: RsiInterval): Promise<RsiCandle[]> {
    const context: ErrorContext = { operation: 'fetch_candles', collaborator: 'solanatracker' };
    const data = await this.circuitBreaker.execute(() => this.request<ChartResponse>(
      `/chart/${encodeURIComponent(token)}`,
      { type: interval, removeOutliers: true },
      context
    ), context);

    const rows = Array.isArray(data.oclhv) ? data.oclhv : [];
    const candles: RsiCandle[] = [];
    for (const row of rows) {
      if (!isRecord(row)) continue;
      const time = numberField(row, 'time');
      const close = numberField(row, 'close');
      if (time > 0 && close > 0) {
        candles.push({ openTime: time * 1000, close });
      }
    }

    candles.sort((a, b) => a.openTime - b.openTime);
    return candles.slice(-MAX_CANDLES);
  }

  /** Bypasses the circuit breaker; pacing and retry belong to the aggregator. */
  async getWalletPnl(wallet: string, token: string): Promise<WalletPnlData> {
    const context: ErrorContext = { operation: 'fetch_wallet_pnl', collaborator: 'solanatracker', wallet };
    const data = await this.request<unknown>(
      `/pnl/${encodeURIComponent(wallet)}/${encodeURIComponent(token)}`,
      {},
      context
    );

    const record = isRecord(data) ? data : {};
    return {
      holding: numberField(record, 'holding'),
      realized: numberField(record, 'realized'),
      unrealized: numberField(record, 'unrealized'),
      currentValue: numberField(record, 'current_value'),
      costBasis: numberField(record, 'cost_basis'),
      lastTradeTime: tradeTimeField(record, 'last_trade_time')
    };
  }

  getCircuitState(): string {
    return this.circuitBreaker.getState();
  }
}
