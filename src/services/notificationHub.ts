import { NotificationEventLog } from './eventLog';
import type { Subscriber } from './subscriber';

export type IdentityKey = (subscriber: Subscriber) => string;

export interface BroadcastSummary {
  message: string;
  recipients: number;
  deliveries: number;
  unknownChannels: number;
}

export const emailIdentity: IdentityKey = (subscriber) => subscriber.email.trim().toLowerCase();

/**
 * Subject side of the observer pair. Membership is keyed by `identityKey` and
 * keeps insertion order, which is also the broadcast order.
 */
export class NotificationHub {
  private readonly members = new Map<string, Subscriber>();

  constructor(
    private readonly eventLog: NotificationEventLog,
    private readonly identityKey: IdentityKey = emailIdentity
  ) {}

  get size(): number {
    return this.members.size;
  }

  has(subscriber: Subscriber): boolean {
    return this.members.has(this.identityKey(subscriber));
  }

  subscribers(): Subscriber[] {
    return Array.from(this.members.values());
  }

  add(subscriber: Subscriber): boolean {
    const key = this.identityKey(subscriber);
    if (this.members.has(key)) {
      this.eventLog.record({ type: 'already_subscribed', subscriber: subscriber.ref });
      return false;
    }
    this.members.set(key, subscriber);
    this.eventLog.record({ type: 'subscribed', subscriber: subscriber.ref });
    return true;
  }

  remove(subscriber: Subscriber): boolean {
    if (!this.members.delete(this.identityKey(subscriber))) {
      this.eventLog.record({ type: 'not_subscribed', subscriber: subscriber.ref });
      return false;
    }
    this.eventLog.record({ type: 'unsubscribed', subscriber: subscriber.ref });
    return true;
  }

  broadcast(message: string): BroadcastSummary {
    const snapshot = this.subscribers();
    const summary: BroadcastSummary = { message, recipients: snapshot.length, deliveries: 0, unknownChannels: 0 };

    if (!snapshot.length) {
      this.eventLog.record({ type: 'broadcast_skipped', message });
      return summary;
    }

    this.eventLog.record({ type: 'broadcast', message, recipients: snapshot.length });
    for (const subscriber of snapshot) {
      const outcome = subscriber.receive(message);
      summary.deliveries += outcome.deliveries.length;
      summary.unknownChannels += outcome.unknownChannels.length;
    }
    return summary;
  }
}
