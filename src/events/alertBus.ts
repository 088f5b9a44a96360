import { EventEmitter } from 'events';
import { AlertPriority, MessageSender } from '../types/notifications';
import { ThresholdSide } from '../types/prices';
import { RsiDirection, RsiInterval } from '../types/rsi';
import { Clock, systemClock } from '../utils/clock';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';

export interface PriceAlertData {
  side: ThresholdSide;
  price: number;
  threshold: number;
}

export interface RsiAlertData {
  direction: RsiDirection;
  rsi: number;
  threshold: number;
  interval: RsiInterval;
}

export type AlertEvent =
  | { id: string; timestamp: number; type: 'price_alert'; priority: AlertPriority; title: string; message: string; data: PriceAlertData }
  | { id: string; timestamp: number; type: 'rsi_alert'; priority: AlertPriority; title: string; message: string; data: RsiAlertData };

export type AlertEventType = AlertEvent['type'];

export interface AlertSubscriber {
  id: string;
  handler: (event: AlertEvent) => Promise<void>;
  filters?: {
    types?: AlertEventType[];
    priority?: AlertPriority[];
  };
}

export interface DeliveryOutcome {
  subscriberId: string;
  delivered: boolean;
  error?: string;
}

/** Logs channels that failed to deliver once the outcomes settle. */
export function reportDeliveries(source: string, deliveries: Promise<DeliveryOutcome[]>): void {
  void deliveries.then((outcomes) => {
    const failed = outcomes.filter(outcome => !outcome.delivered);
    if (failed.length > 0) {
      logger.warn(`${source} alert delivery failed on ${failed.length} channel(s)`, {
        channels: failed.map(outcome => outcome.subscriberId)
      });
    }
  });
}

/**
 * Fans alert events out to notification subscribers. Dispatch resolves with
 * one outcome per matching subscriber and never rejects, so a failed delivery
 * cannot undo the state change that produced the event.
 */
export class AlertEventBus extends EventEmitter {
  private subscribers = new Map<string, AlertSubscriber>();
  private eventHistory: AlertEvent[] = [];
  private readonly maxHistorySize = 1000;
  private sequence = 0;
  private readonly timezone: string;

  constructor(
    timezone: string = 'UTC',
    private readonly clock: Clock = systemClock
  ) {
    super();
    if (Formatters.isValidTimeZone(timezone)) {
      this.timezone = timezone;
    } else {
      logger.warn(`Unknown time zone "${timezone}" for alert messages, using UTC`);
      this.timezone = 'UTC';
    }
  }

  subscribe(subscriber: AlertSubscriber): void {
    this.subscribers.set(subscriber.id, subscriber);
    logger.info(`Alert subscriber registered: ${subscriber.id}`);
  }

  /** Registers a message sender as a subscriber under its channel name. */
  subscribeSender(sender: MessageSender, filters?: AlertSubscriber['filters']): void {
    this.subscribe({
      id: sender.channel,
      handler: (event) => sender.send(event.title, event.message, event.priority),
      filters
    });
  }

  private matches(subscriber: AlertSubscriber, event: AlertEvent): boolean {
    const { filters } = subscriber;
    if (!filters) return true;
    if (filters.types && !filters.types.includes(event.type)) return false;
    if (filters.priority && !filters.priority.includes(event.priority)) return false;
    return true;
  }

  async dispatch(event: AlertEvent): Promise<DeliveryOutcome[]> {
    this.eventHistory.unshift(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory = this.eventHistory.slice(0, this.maxHistorySize);
    }

    const targets = [...this.subscribers.values()].filter(subscriber => this.matches(subscriber, event));
    const outcomes = await Promise.all(targets.map(async (subscriber): Promise<DeliveryOutcome> => {
      try {
        await subscriber.handler(event);
        return { subscriberId: subscriber.id, delivered: true };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Error in alert subscriber ${subscriber.id}:`, { eventId: event.id, error: message });
        return { subscriberId: subscriber.id, delivered: false, error: message };
      }
    }));

    logger.debug(`Alert event dispatched: ${event.type} - ${event.id}`, {
      delivered: outcomes.filter(outcome => outcome.delivered).length,
      failed: outcomes.filter(outcome => !outcome.delivered).length
    });
    this.emit('dispatched', event, outcomes);

    return outcomes;
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}_${this.clock.now()}_${this.sequence}`;
  }

  /** Builds and dispatches an event; a failure to build is reported as an outcome, not thrown. */
  private publish(build: () => AlertEvent): Promise<DeliveryOutcome[]> {
    let event: AlertEvent;
    try {
      event = build();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to build alert event:', { error: message });
      return Promise.resolve([{ subscriberId: 'alert_bus', delivered: false, error: message }]);
    }
    return this.dispatch(event);
  }

  emitPriceAlert(data: PriceAlertData): Promise<DeliveryOutcome[]> {
    return this.publish(() => this.buildPriceAlert(data));
  }

  emitRsiAlert(data: RsiAlertData): Promise<DeliveryOutcome[]> {
    return this.publish(() => this.buildRsiAlert(data));
  }

  private buildPriceAlert(data: PriceAlertData): AlertEvent {
    const timestamp = this.clock.now();
    const isBuy = data.side === 'buy';
    const label = isBuy ? 'Buy' : 'Sell';
    const comparison = isBuy ? '≤' : '≥';

    return {
      id: this.nextId(`price_${data.side}`),
      timestamp,
      type: 'price_alert',
      priority: 'high',
      title: `${label} Price Alert`,
      message: [
        `${label} price ${Formatters.formatPrice(data.price)} is ${comparison} target ${Formatters.formatPrice(data.threshold)}`,
        Formatters.formatTimestamp(timestamp, this.timezone)
      ].join('\n'),
      data
    };
  }

  private buildRsiAlert(data: RsiAlertData): AlertEvent {
    const timestamp = this.clock.now();
    const comparison = data.direction === 'above' ? '≥' : '≤';

    return {
      id: this.nextId(`rsi_${data.direction}`),
      timestamp,
      type: 'rsi_alert',
      priority: 'high',
      title: `RSI ${data.direction === 'above' ? 'Above' : 'Below'} Alert`,
      message: [
        `RSI ${data.rsi.toFixed(2)} is ${comparison} ${data.threshold.toFixed(2)} (${data.interval})`,
        Formatters.formatTimestamp(timestamp, this.timezone)
      ].join('\n'),
      data
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  getStats(): {
    totalEvents: number;
    subscriberCount: number;
    eventsByType: Record<string, number>;
    eventsByPriority: Record<string, number>;
  } {
    const eventsByType: Record<string, number> = {};
    const eventsByPriority: Record<string, number> = {};

    for (const event of this.eventHistory) {
      eventsByType[event.type] = (eventsByType[event.type] || 0) + 1;
      eventsByPriority[event.priority] = (eventsByPriority[event.priority] || 0) + 1;
    }

    return {
      totalEvents: this.eventHistory.length,
      subscriberCount: this.subscribers.size,
      eventsByType,
      eventsByPriority
    };
  }
}
