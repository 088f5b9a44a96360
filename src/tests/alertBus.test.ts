import { AlertEvent, AlertEventBus, DeliveryOutcome } from '../events/alertBus';
import { FakeClock, RecordingSender, createTestBus } from './helpers';

describe('AlertEventBus', () => {
  it('formats price alerts and reports delivery per subscriber', async () => {
    const clock = new FakeClock();
    const { bus, sender } = createTestBus(clock);

    const outcomes = await bus.emitPriceAlert({ side: 'buy', price: 0.00134, threshold: 0.00135 });

    expect(outcomes).toEqual([{ subscriberId: 'recording', delivered: true }]);
    expect(sender.sent).toEqual([{
      title: 'Buy Price Alert',
      message: 'Buy price $0.00134000 is ≤ target $0.00135000\n2024-01-01 00:00:00 UTC',
      priority: 'high'
    }]);
  });

  it('formats RSI alerts with the interval', async () => {
    const clock = new FakeClock();
    const { bus, sender } = createTestBus(clock);

    await bus.emitRsiAlert({ direction: 'above', rsi: 100, threshold: 70, interval: '1m' });

    expect(sender.sent[0]?.title).toBe('RSI Above Alert');
    expect(sender.sent[0]?.message).toBe('RSI 100.00 is ≥ 70.00 (1m)\n2024-01-01 00:00:00 UTC');
  });

  it('renders timestamps in UTC when the configured zone is unknown', async () => {
    const bus = new AlertEventBus('Not/AZone', new FakeClock());
    const sender = new RecordingSender();
    bus.subscribeSender(sender);

    const outcomes = await bus.emitPriceAlert({ side: 'buy', price: 0.00134, threshold: 0.00135 });

    expect(outcomes).toEqual([{ subscriberId: 'recording', delivered: true }]);
    expect(sender.sent[0]?.message).toBe('Buy price $0.00134000 is ≤ target $0.00135000\n2024-01-01 00:00:00 UTC');
  });

  it('keeps delivering to healthy subscribers when one fails', async () => {
    const clock = new FakeClock();
    const { bus, sender } = createTestBus(clock);
    const broken = new RecordingSender('ntfy');
    broken.fail = true;
    bus.subscribeSender(broken);

    const outcomes = await bus.emitPriceAlert({ side: 'sell', price: 0.0021, threshold: 0.002 });

    expect(outcomes).toEqual([
      { subscriberId: 'recording', delivered: true },
      { subscriberId: 'ntfy', delivered: false, error: 'ntfy is down' }
    ]);
    expect(sender.sent[0]?.title).toBe('Sell Price Alert');
  });

  it('only delivers events matching subscriber filters', async () => {
    const clock = new FakeClock();
    const { bus } = createTestBus(clock);
    const rsiOnly = new RecordingSender('rsi-desk');
    bus.subscribeSender(rsiOnly, { types: ['rsi_alert'] });

    const priceOutcomes = await bus.emitPriceAlert({ side: 'buy', price: 1, threshold: 2 });
    await bus.emitRsiAlert({ direction: 'below', rsi: 25, threshold: 30, interval: '1h' });

    expect(priceOutcomes.map(outcome => outcome.subscriberId)).toEqual(['recording']);
    expect(rsiOnly.sent.map(sent => sent.title)).toEqual(['RSI Below Alert']);
  });

  it('emits a dispatched event with the outcomes', async () => {
    const clock = new FakeClock();
    const { bus } = createTestBus(clock);
    const seen: Array<{ event: AlertEvent; outcomes: DeliveryOutcome[] }> = [];
    bus.on('dispatched', (event: AlertEvent, outcomes: DeliveryOutcome[]) => seen.push({ event, outcomes }));

    await bus.emitPriceAlert({ side: 'sell', price: 3, threshold: 2 });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.event.type).toBe('price_alert');
    expect(seen[0]?.outcomes).toEqual([{ subscriberId: 'recording', delivered: true }]);
  });

  it('counts dispatched events by type and priority', async () => {
    const clock = new FakeClock();
    const { bus } = createTestBus(clock);

    await bus.emitPriceAlert({ side: 'buy', price: 1, threshold: 2 });
    await bus.emitRsiAlert({ direction: 'below', rsi: 20, threshold: 30, interval: '5m' });

    expect(bus.getStats()).toEqual({
      totalEvents: 2,
      subscriberCount: 1,
      eventsByType: { price_alert: 1, rsi_alert: 1 },
      eventsByPriority: { high: 2 }
    });
  });
});
