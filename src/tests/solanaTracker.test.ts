import { SolanaTrackerService } from '../services/solanaTracker';
import { CircuitBreaker, isAppError } from '../utils/errorHandler';
import { TEST_TOKEN, WALLET_A } from './helpers';
import { stubAdapter } from './httpStub';

describe('SolanaTrackerService', () => {
  it('fetches chart candles with the API key and keeps them in time order', async () => {
    const { adapter, requests } = stubAdapter(() => ({
      status: 200,
      data: {
        oclhv: [
          { open: 1, close: 1.2, low: 0.9, high: 1.3, volume: 10, time: 1_700_000_060 },
          { open: 1, close: 1.1, low: 0.9, high: 1.2, volume: 10, time: 1_700_000_000 },
          { open: 1, close: 'bad', time: 1_700_000_120 }
        ]
      }
    }));
    const service = new SolanaTrackerService({ apiKey: 'test-secret', adapter });

    const candles = await service.getCandles(TEST_TOKEN, '1m');

    expect(candles).toEqual([
      { openTime: 1_700_000_000_000, close: 1.1 },
      { openTime: 1_700_000_060_000, close: 1.2 }
    ]);
    expect(requests[0]?.url).toBe(`/chart/${TEST_TOKEN}`);
    expect(requests[0]?.params).toEqual({ type: '1m', removeOutliers: true });
    expect(requests[0]?.headers.get('x-api-key')).toBe('test-secret');
    expect(requests[0]?.timeout).toBe(15000);
  });

  it('normalises wallet PnL fields', async () => {
    const { adapter, requests } = stubAdapter(() => ({
      status: 200,
      data: {
        holding: '12.5',
        realized: 3,
        unrealized: -1.5,
        current_value: 40,
        cost_basis: 2.25,
        last_trade_time: 1_700_000_000_000
      }
    }));
    const service = new SolanaTrackerService({ apiKey: 'test-secret', adapter });

    await expect(service.getWalletPnl(WALLET_A, TEST_TOKEN)).resolves.toEqual({
      holding: 12.5,
      realized: 3,
      unrealized: -1.5,
      currentValue: 40,
      costBasis: 2.25,
      lastTradeTime: 1_700_000_000_000
    });
    expect(requests[0]?.url).toBe(`/pnl/${WALLET_A}/${TEST_TOKEN}`);
  });

  it('reports rate limiting as its own error code', async () => {
    const { adapter } = stubAdapter(() => ({ status: 429, data: { error: 'slow down' } }));
    const service = new SolanaTrackerService({ apiKey: 'test-secret', adapter });

    const failure = await service.getWalletPnl(WALLET_A, TEST_TOKEN).catch((error: unknown) => error);

    expect(isAppError(failure, 'RATE_LIMITED')).toBe(true);
  });

  it('keeps the circuit closed while rate limited', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 429, data: {} }));
    const service = new SolanaTrackerService({ apiKey: 'test-secret', adapter });

    for (let i = 0; i < 6; i++) {
      await service.getCandles(TEST_TOKEN, '1m').catch(() => undefined);
    }

    expect(requests).toHaveLength(6);
    expect(service.getCircuitState()).toBe('CLOSED');
  });

  it('does not gate wallet PnL calls on the circuit', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 500, data: {} }));
    const service = new SolanaTrackerService({
      apiKey: 'test-secret',
      adapter,
      circuitBreaker: new CircuitBreaker({ failureThreshold: 2, recoveryTimeout: 60000 })
    });

    for (let i = 0; i < 3; i++) {
      await service.getWalletPnl(WALLET_A, TEST_TOKEN).catch(() => undefined);
    }

    expect(requests).toHaveLength(3);
    expect(service.getCircuitState()).toBe('CLOSED');
  });

  it('stops calling out once the circuit opens', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 500, data: {} }));
    const service = new SolanaTrackerService({
      apiKey: 'test-secret',
      adapter,
      circuitBreaker: new CircuitBreaker({ failureThreshold: 2, recoveryTimeout: 60000 })
    });

    await service.getCandles(TEST_TOKEN, '1m').catch(() => undefined);
    await service.getCandles(TEST_TOKEN, '1m').catch(() => undefined);
    const third = await service.getCandles(TEST_TOKEN, '1m').catch((error: unknown) => error);

    expect(requests).toHaveLength(2);
    expect(isAppError(third, 'CIRCUIT_BREAKER_OPEN')).toBe(true);
    expect(service.getCircuitState()).toBe('OPEN');
  });
});
