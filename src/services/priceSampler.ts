import { PriceQuoter, PriceSample } from '../types/prices';
import { Clock, systemClock } from '../utils/clock';
import { globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SampleValidator, createSampleValidator } from '../utils/validation';
import { StateStore } from './stateStore';
import { EvaluationResult, ThresholdAlertEngine } from './thresholdAlerts';

export interface SamplerMints {
  inputMint: string;
  outputMint: string;
  inputDecimals: number;
  outputDecimals: number;
}

export type SkipReason = 'quote_failed' | 'invalid_sample' | 'notional_changed';

export type SampleOutcome =
  | { status: 'recorded'; sample: PriceSample; evaluation: EvaluationResult }
  | { status: 'skipped'; reason: SkipReason };

/**
 * Simulates a round trip of the configured USD notional through the quoting
 * service. buyPrice is USD paid per token received; sellPrice is USD returned
 * per token when the same tokens are sold back.
 */
export class PriceSampler {
  private readonly validator: SampleValidator;

  constructor(
    private readonly store: StateStore,
    private readonly quoter: PriceQuoter,
    private readonly thresholds: ThresholdAlertEngine,
    private readonly mints: SamplerMints,
    private readonly clock: Clock = systemClock,
    validator?: SampleValidator
  ) {
    this.validator = validator ?? createSampleValidator();
  }

  async sample(): Promise<SampleOutcome> {
    const usdAmount = this.store.getUsdAmount();
    const inputScale = 10 ** this.mints.inputDecimals;
    const outputScale = 10 ** this.mints.outputDecimals;

    let tokensRaw: number;
    let usdReturnedRaw: number;
    try {
      const forward = await this.quoter.quote({
        inputMint: this.mints.inputMint,
        outputMint: this.mints.outputMint,
        amount: Math.round(usdAmount * inputScale)
      });
      tokensRaw = forward.outAmount;

      const reverse = await this.quoter.quote({
        inputMint: this.mints.outputMint,
        outputMint: this.mints.inputMint,
        amount: Math.round(tokensRaw)
      });
      usdReturnedRaw = reverse.outAmount;
    } catch (error) {
      globalErrorHandler.handleError(error, { operation: 'price_sample', collaborator: 'jupiter' });
      return { status: 'skipped', reason: 'quote_failed' };
    }

    const tokensReceived = tokensRaw / outputScale;
    const usdReturned = usdReturnedRaw / inputScale;
    const sample: PriceSample = {
      timestamp: this.clock.now(),
      buyPrice: tokensReceived > 0 ? usdAmount / tokensReceived : NaN,
      sellPrice: tokensReceived > 0 ? usdReturned / tokensReceived : NaN
    };

    if (!this.validator.validateSample(sample).isValid) {
      return { status: 'skipped', reason: 'invalid_sample' };
    }

    const recorded = this.store.runExclusive(() => {
      if (this.store.getUsdAmount() !== usdAmount) {
        return false;
      }
      this.store.appendPriceSample(sample);
      return true;
    });

    if (!recorded) {
      logger.info('Notional changed while sampling, discarding sample');
      return { status: 'skipped', reason: 'notional_changed' };
    }

    logger.debug('Price sample recorded', {
      buyPrice: sample.buyPrice,
      sellPrice: sample.sellPrice,
      tokensReceived
    });

    return { status: 'recorded', sample, evaluation: this.thresholds.evaluate(sample) };
  }
}
