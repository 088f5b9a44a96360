import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { PriceQuoter, QuoteRequest, SwapQuote } from '../types/prices';
import { AppError, ErrorSeverity, toCollaboratorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SlidingWindowRateLimiter } from './rateLimiter';

interface JupiterQuoteResponse {
  inAmount?: unknown;
  outAmount?: unknown;
  priceImpactPct?: unknown;
}

export interface JupiterQuoteOptions {
  baseURL?: string;
  timeoutMs?: number;
  slippageBps?: number;
  adapter?: AxiosAdapter;
  rateLimiter?: SlidingWindowRateLimiter;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

export class JupiterQuoteService implements PriceQuoter {
  private readonly client: AxiosInstance;
  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly slippageBps: number;

  constructor(options: JupiterQuoteOptions = {}) {
    this.slippageBps = options.slippageBps ?? 100;
    this.rateLimiter = options.rateLimiter ?? new SlidingWindowRateLimiter(60, 60000);
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://quote-api.jup.ag/v6',
      timeout: options.timeoutMs ?? 10000,
      adapter: options.adapter,
      headers: {
        'Accept': 'application/json'
      }
    });

    this.client.interceptors.request.use(async (config) => {
      await this.rateLimiter.acquire();
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.warn('Jupiter quote API error:', {
            status: error.response?.status,
            message: error.message
          });
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Impact-inclusive quote for swapping `amount` raw units of the input mint.
   * A missing or non-positive `outAmount` is reported as the collaborator
   * being unavailable.
   */
  async quote(request: QuoteRequest): Promise<SwapQuote> {
    const context = { operation: 'jupiter_quote', collaborator: 'jupiter' };

    let data: JupiterQuoteResponse;
    try {
      const response = await this.client.get<JupiterQuoteResponse>('/quote', {
        params: {
          inputMint: request.inputMint,
          outputMint: request.outputMint,
          amount: Math.floor(request.amount),
          slippageBps: this.slippageBps
        }
      });
      data = response.data;
    } catch (error) {
      throw toCollaboratorError(error, context);
    }

    const outAmount = toNumber(data.outAmount);
    if (!Number.isFinite(outAmount) || outAmount <= 0) {
      throw new AppError(
        `jupiter returned an unusable outAmount: ${String(data.outAmount)}`,
        'COLLABORATOR_UNAVAILABLE',
        ErrorSeverity.MEDIUM,
        context
      );
    }

    const inAmount = toNumber(data.inAmount);
    const priceImpactPct = toNumber(data.priceImpactPct);

    return {
      inAmount: Number.isFinite(inAmount) ? inAmount : request.amount,
      outAmount,
      priceImpactPct: Number.isFinite(priceImpactPct) ? priceImpactPct : 0
    };
  }
}
