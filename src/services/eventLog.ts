import { v4 as uuid } from 'uuid';
import config from '../config/env';
import {
  NotificationEvent,
  NotificationEventInput,
  NotificationEventOf,
  NotificationEventType
} from '../domain/types';
import logger from '../utils/logger';
import { broadcastCounter, deliveryCounter, unknownChannelCounter } from '../utils/metrics';
import { isoNow } from '../utils/time';

export type NotificationListener = (event: NotificationEvent) => void;

export interface EventLogOptions {
  historyLimit?: number;
  metricsEnabled?: boolean;
}

export class NotificationEventLog {
  private events: NotificationEvent[] = [];
  private readonly listeners = new Set<NotificationListener>();
  private readonly historyLimit: number;
  private readonly metricsEnabled: boolean;

  constructor(options: EventLogOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? config.eventHistoryLimit);
    this.metricsEnabled = options.metricsEnabled ?? config.metrics.enabled;
  }

  record(input: NotificationEventInput): NotificationEvent {
    const event: NotificationEvent = { ...input, id: uuid(), timestamp: isoNow() };

    this.events.push(event);
    if (this.events.length > this.historyLimit) {
      this.events = this.events.slice(this.events.length - this.historyLimit);
    }

    this.write(event);
    if (this.metricsEnabled) {
      this.track(event);
    }
    this.listeners.forEach((listener) => listener(event));
    return event;
  }

  list(): NotificationEvent[] {
    return [...this.events];
  }

  listByType<T extends NotificationEventType>(type: T): NotificationEventOf<T>[] {
    return this.events.filter((event): event is NotificationEventOf<T> => event.type === type);
  }

  clear(): void {
    this.events = [];
  }

  onEvent(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private write(event: NotificationEvent): void {
    switch (event.type) {
      case 'delivery':
        logger.info(
          { channel: event.channel, destination: event.destination, subscriber: event.subscriber.email },
          event.text
        );
        return;
      case 'unknown_channel':
        logger.warn(
          { channel: event.channel, subscriber: event.subscriber.email },
          `Unknown channel "${event.channel}" for subscriber ${event.subscriber.name}`
        );
        return;
      case 'subscribed':
        logger.info({ subscriber: event.subscriber.email }, `${event.subscriber.name} subscribed`);
        return;
      case 'already_subscribed':
        logger.info({ subscriber: event.subscriber.email }, `${event.subscriber.name} was already subscribed`);
        return;
      case 'unsubscribed':
        logger.info({ subscriber: event.subscriber.email }, `${event.subscriber.name} unsubscribed`);
        return;
      case 'not_subscribed':
        logger.info({ subscriber: event.subscriber.email }, `${event.subscriber.name} was not subscribed`);
        return;
      case 'broadcast':
        logger.info({ recipients: event.recipients }, `Broadcasting message to ${event.recipients} subscriber(s)`);
        return;
      case 'broadcast_skipped':
        logger.info('No subscribers registered, broadcast skipped');
        return;
    }
  }

  private track(event: NotificationEvent): void {
    if (event.type === 'delivery') {
      deliveryCounter.inc({ channel: event.channel });
    } else if (event.type === 'unknown_channel') {
      unknownChannelCounter.inc();
    } else if (event.type === 'broadcast') {
      broadcastCounter.inc();
    }
  }
}
