import { ControlService } from '../services/control';
import { RsiEngine } from '../services/rsiEngine';
import { StateStore } from '../services/stateStore';
import { WalletPnlAggregator } from '../services/walletPnl';
import { CandleSource, RsiCandle } from '../types/rsi';
import { ThresholdKey } from '../utils/alertKeys';
import { DatabaseManager } from '../utils/database';
import { isAppError } from '../utils/errorHandler';
import { FakeClock, TEST_TOKEN, WALLET_A, createTestBus, createTestStore } from './helpers';

const emptySource: CandleSource = {
  getCandles: async (): Promise<RsiCandle[]> => []
};

function expectInvalidInput(fn: () => unknown): void {
  let caught: unknown = null;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(isAppError(caught, 'INVALID_INPUT')).toBe(true);
}

describe('ControlService', () => {
  let clock: FakeClock;
  let store: StateStore;
  let database: DatabaseManager;
  let rsiEngine: RsiEngine;
  let control: ControlService;

  beforeEach(() => {
    clock = new FakeClock();
    ({ store, database } = createTestStore({ buyThresholds: [0.002], alertResetMinutes: 10 }));
    const { bus } = createTestBus(clock);
    rsiEngine = new RsiEngine(store, bus, emptySource, TEST_TOKEN, clock);
    control = new ControlService(store, rsiEngine, new WalletPnlAggregator(store, null, TEST_TOKEN, clock), clock);
  });

  afterEach(() => {
    database.close();
  });

  it('rejects invalid input without changing state', () => {
    const before = store.getSnapshot();

    expectInvalidInput(() => control.setUsdAmount(0));
    expectInvalidInput(() => control.setUsdAmount(-5));
    expectInvalidInput(() => control.setAlertResetMinutes(-1));
    expectInvalidInput(() => control.setAlertResetMinutes(1.5));
    expectInvalidInput(() => control.addThresholds('buy', [0.001, -1]));
    expectInvalidInput(() => control.addThresholds('hold', [0.001]));
    expectInvalidInput(() => control.addWallet('0xdeadbeef'));
    expectInvalidInput(() => control.setRsiInterval('2m'));
    expectInvalidInput(() => control.addRsiAlerts(['above:70', 'sideways:50']));
    expectInvalidInput(() => control.addRsiAlerts(['above:170']));

    expect(store.getSnapshot()).toEqual(before);
  });

  it('adds thresholds idempotently and reports what was new', () => {
    expect(control.addThresholds('buy', [0.002, 0.0015])).toEqual({ added: [0.0015], existing: [0.002] });
    expect(control.getState().buyThresholds.map(threshold => threshold.value)).toEqual([0.0015, 0.002]);
  });

  it('reports no change when removing or resetting an absent key', () => {
    expect(control.removeThreshold('sell', 0.5)).toEqual({ changed: false });
    expect(control.resetThreshold('sell', 0.5)).toEqual({ changed: false });
    expect(control.removeRsiAlert('below:20')).toEqual({ changed: false });
    expect(control.resetRsiAlert({ direction: 'below', threshold: 20 })).toEqual({ changed: false });
  });

  it('shows whether each threshold can fire under the cooldown', () => {
    store.markThresholdTriggered(ThresholdKey.of('buy', 0.002), clock.now());

    expect(control.getState().buyThresholds).toEqual([
      { value: 0.002, lastTriggeredAt: clock.now(), active: false }
    ]);

    clock.advance(10 * 60000);
    expect(control.getState().buyThresholds[0]?.active).toBe(true);

    expect(control.resetThreshold('buy', 0.002)).toEqual({ changed: true });
    expect(control.getState().buyThresholds[0]).toEqual({ value: 0.002, lastTriggeredAt: null, active: true });
  });

  it('clears history when the notional changes', () => {
    store.appendPriceSample({ timestamp: clock.now(), buyPrice: 0.002, sellPrice: 0.0019 });

    control.setUsdAmount(250);

    const state = control.getState();
    expect(state.usdAmount).toBe(250);
    expect(state.priceHistory).toEqual([]);
  });

  it('adds wallets once', () => {
    expect(control.addWallet(` ${WALLET_A} `)).toEqual({ changed: true });
    expect(control.addWallet(WALLET_A)).toEqual({ changed: false });
    expect(control.getState().wallets).toEqual([WALLET_A]);
  });

  it('rebuilds RSI only when the interval actually changes', async () => {
    expect(control.setRsiInterval('1m')).toEqual({ changed: false });
    expect(rsiEngine.getStatus()).toEqual({ state: 'unavailable', reason: 'not_started', interval: '1m' });

    expect(control.setRsiInterval('15m')).toEqual({ changed: true });
    expect(control.getState().rsi.status).toEqual({ state: 'unavailable', reason: 'rebuilding', interval: '15m' });

    await new Promise(resolve => setImmediate(resolve));
    expect(rsiEngine.getStatus()).toEqual({ state: 'unavailable', reason: 'insufficient_data', interval: '15m' });
  });

  it('starts rebuilding RSI as soon as the interval changes', async () => {
    const fiveMinutes = 5 * 60000;
    const candles: RsiCandle[] = Array.from({ length: 15 }, (_, i) => ({
      openTime: clock.now() - (15 - i) * fiveMinutes,
      close: i + 1
    }));
    const requested: string[] = [];
    const source: CandleSource = {
      getCandles: async (_token, interval) => {
        requested.push(interval);
        return candles;
      }
    };
    const { bus } = createTestBus(clock);
    const engine = new RsiEngine(store, bus, source, TEST_TOKEN, clock);
    const immediate = new ControlService(store, engine, new WalletPnlAggregator(store, null, TEST_TOKEN, clock), clock);

    immediate.setRsiInterval('5m');
    await new Promise(resolve => setImmediate(resolve));

    expect(requested).toEqual(['5m']);
    expect(engine.getStatus()).toEqual({
      state: 'ready',
      value: 100,
      candleTime: clock.now(),
      interval: '5m',
      computedAt: clock.now()
    });
  });

  it('accepts RSI alerts in either form and exposes their keys', () => {
    expect(control.addRsiAlerts(['above:70', { direction: 'below', threshold: 30 }, 'Above:70.00'])).toEqual({
      added: ['above:70.00', 'below:30.00'],
      existing: ['above:70.00']
    });

    control.setRsiResetEnabled(true);
    const { rsi } = control.getState();
    expect(rsi.config).toEqual({ interval: '1m', resetEnabled: true });
    expect(rsi.alerts.map(alert => alert.key)).toEqual(['above:70.00', 'below:30.00']);
  });

  it('reports a disabled PnL refresh without an analytics key', async () => {
    await expect(control.refreshWalletPnl()).resolves.toEqual({ status: 'disabled' });
    expect(control.getWalletPnl()).toBeNull();
  });

  it('summarises state for chat channels', () => {
    const summary = control.formatStatusSummary('UTC');

    expect(summary.split('\n')).toEqual([
      '📊 Notional: $100.00',
      'No price samples yet',
      'Thresholds: 1 buy, 0 sell',
      'RSI (1m): unavailable (not_started)'
    ]);
  });
});
