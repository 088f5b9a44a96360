import { AlertEventBus } from '../events/alertBus';
import { StateStore, StoreDefaults } from '../services/stateStore';
import { AlertPriority, MessageSender } from '../types/notifications';
import { Clock } from '../utils/clock';
import { DatabaseManager, IN_MEMORY } from '../utils/database';

export const TEST_TOKEN = 'TokenMint' + '1'.repeat(35);
export const WALLET_A = 'WaLLetA' + '1'.repeat(37);
export const WALLET_B = 'WaLLetB' + '2'.repeat(37);
export const WALLET_C = 'WaLLetC' + '3'.repeat(37);

export class FakeClock implements Clock {
  constructor(public current: number = Date.UTC(2024, 0, 1)) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Sleep that records the requested delay and advances the fake clock instead of waiting. */
export function fakeSleep(clock: FakeClock): { sleep: (ms: number) => Promise<void>; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms: number) => {
      calls.push(ms);
      clock.advance(ms);
    }
  };
}

export class RecordingSender implements MessageSender {
  readonly sent: Array<{ title: string; message: string; priority: AlertPriority }> = [];
  fail = false;

  constructor(readonly channel: string = 'recording') {}

  async send(title: string, message: string, priority: AlertPriority): Promise<void> {
    if (this.fail) {
      throw new Error(`${this.channel} is down`);
    }
    this.sent.push({ title, message, priority });
  }
}

export function defaultStoreDefaults(overrides: Partial<StoreDefaults> = {}): StoreDefaults {
  return {
    usdAmount: 100,
    alertResetMinutes: 0,
    rsiInterval: '1m',
    rsiResetEnabled: false,
    trackedToken: TEST_TOKEN,
    buyThresholds: [],
    sellThresholds: [],
    rsiAlerts: [],
    wallets: [],
    ...overrides
  };
}

export function createTestStore(overrides: Partial<StoreDefaults> = {}): { database: DatabaseManager; store: StateStore } {
  const database = new DatabaseManager(IN_MEMORY);
  const store = new StateStore(database.db, defaultStoreDefaults(overrides));
  return { database, store };
}

export function createTestBus(clock: Clock): { bus: AlertEventBus; sender: RecordingSender } {
  const bus = new AlertEventBus('UTC', clock);
  const sender = new RecordingSender();
  bus.subscribeSender(sender);
  return { bus, sender };
}
