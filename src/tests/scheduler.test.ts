import { PriceSampler } from '../services/priceSampler';
import { RsiEngine } from '../services/rsiEngine';
import { SchedulerService } from '../services/scheduler';
import { StateStore } from '../services/stateStore';
import { ThresholdAlertEngine } from '../services/thresholdAlerts';
import { WalletPnlAggregator } from '../services/walletPnl';
import { TimerApi } from '../services/periodicTask';
import { PriceQuoter, SwapQuote } from '../types/prices';
import { CandleSource, RsiCandle } from '../types/rsi';
import { USDC_MINT } from '../utils/config';
import { DatabaseManager } from '../utils/database';
import { FakeClock, TEST_TOKEN, createTestBus, createTestStore } from './helpers';

class RecordingTimer implements TimerApi {
  scheduled: number[] = [];
  cancelled = 0;

  schedule(_callback: () => void, intervalMs: number): () => void {
    this.scheduled.push(intervalMs);
    return () => {
      this.cancelled++;
    };
  }
}

const fixedQuoter: PriceQuoter = {
  quote: async (request): Promise<SwapQuote> => ({
    inAmount: request.amount,
    outAmount: request.inputMint === USDC_MINT ? 50_000_000_000 : 95_000_000,
    priceImpactPct: 0
  })
};

const emptySource: CandleSource = {
  getCandles: async (): Promise<RsiCandle[]> => []
};

const config = {
  checkIntervalSeconds: 60,
  rsiCheckIntervalMinutes: 5,
  pnlRefreshCron: '*/15 * * * *',
  timezone: 'UTC'
};

describe('SchedulerService', () => {
  let clock: FakeClock;
  let store: StateStore;
  let database: DatabaseManager;
  let timer: RecordingTimer;

  beforeEach(() => {
    clock = new FakeClock();
    ({ store, database } = createTestStore());
    timer = new RecordingTimer();
  });

  afterEach(() => {
    database.close();
  });

  function build(source: CandleSource | null): SchedulerService {
    const { bus } = createTestBus(clock);
    const sampler = new PriceSampler(store, fixedQuoter, new ThresholdAlertEngine(store, bus, clock), {
      inputMint: USDC_MINT,
      outputMint: TEST_TOKEN,
      inputDecimals: 6,
      outputDecimals: 6
    }, clock);
    const rsiEngine = new RsiEngine(store, bus, source, TEST_TOKEN, clock);
    const aggregator = new WalletPnlAggregator(store, null, TEST_TOKEN, clock);
    return new SchedulerService(sampler, rsiEngine, aggregator, config, timer);
  }

  it('runs only the price sampler when analytics are disabled', async () => {
    const scheduler = build(null);

    scheduler.start();
    const status = scheduler.getStatus();
    await scheduler.stop();

    expect(status.running).toBe(true);
    expect(status.tasks.map(task => task.name)).toEqual(['price_sampler']);
    expect(status.pnlCron).toBeNull();
    expect(timer.scheduled).toEqual([60000]);
    expect(store.getPriceHistory()).toEqual([{ timestamp: clock.now(), buyPrice: 0.002, sellPrice: 0.0019 }]);
  });

  it('adds the RSI refresh when a candle source is configured', async () => {
    const scheduler = build(emptySource);

    scheduler.start();
    const names = scheduler.getStatus().tasks.map(task => task.name);
    await scheduler.stop();

    expect(names).toEqual(['price_sampler', 'rsi_refresh']);
    expect(timer.scheduled).toEqual([60000, 300000]);
    expect(timer.cancelled).toBe(2);
    expect(scheduler.getStatus()).toEqual({ running: false, tasks: [], pnlCron: null });
  });

  it('ignores a second start', async () => {
    const scheduler = build(null);

    scheduler.start();
    scheduler.start();
    await scheduler.stop();

    expect(timer.scheduled).toEqual([60000]);
  });
});
