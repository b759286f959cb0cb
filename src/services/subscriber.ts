import { ChannelDelivery, SubscriberProfile, SubscriberRef } from '../domain/types';
import { NotifierRegistry } from '../notifiers/registry';
import { assertNonEmpty, assertValidEmail, sanitizeList, sanitizeString } from '../utils/validators';
import { NotificationEventLog } from './eventLog';
import type { NotificationHub } from './notificationHub';

export interface SubscriberDependencies {
  registry: NotifierRegistry;
  eventLog: NotificationEventLog;
}

export interface ReceiveOutcome {
  deliveries: ChannelDelivery[];
  /** Preferred tags that did not resolve to a sender, as configured. */
  unknownChannels: string[];
}

export class Subscriber {
  readonly displayName: string;
  readonly email: string;
  readonly phone: string;
  readonly preferredChannels: readonly string[];
  private lastReceived: string | undefined;

  constructor(profile: SubscriberProfile, private readonly deps: SubscriberDependencies) {
    this.displayName = profile.displayName;
    this.email = profile.email;
    this.phone = profile.phone;
    this.preferredChannels = [...profile.preferredChannels];
  }

  get lastMessage(): string | undefined {
    return this.lastReceived;
  }

  get ref(): SubscriberRef {
    return { name: this.displayName, email: this.email };
  }

  receive(message: string): ReceiveOutcome {
    this.lastReceived = message;
    const outcome: ReceiveOutcome = { deliveries: [], unknownChannels: [] };

    for (const tag of this.preferredChannels) {
      const resolution = this.deps.registry.resolve(tag);
      if (!resolution.ok) {
        outcome.unknownChannels.push(resolution.error.tag);
        this.deps.eventLog.record({
          type: 'unknown_channel',
          subscriber: this.ref,
          channel: resolution.error.tag,
          message
        });
        continue;
      }

      const delivery = resolution.notifier.send(message, this);
      outcome.deliveries.push(delivery);
      this.deps.eventLog.record({ type: 'delivery', subscriber: this.ref, ...delivery });
    }

    return outcome;
  }

  subscribe(hub: NotificationHub): boolean {
    return hub.add(this);
  }

  unsubscribe(hub: NotificationHub): boolean {
    return hub.remove(this);
  }
}

export const createSubscriber = (profile: SubscriberProfile, deps: SubscriberDependencies): Subscriber => {
  const displayName = sanitizeString(profile.displayName);
  const email = sanitizeString(profile.email);
  assertNonEmpty(displayName, 'displayName');
  assertValidEmail(email, 'email');

  return new Subscriber(
    {
      displayName,
      email,
      phone: sanitizeString(profile.phone),
      preferredChannels: sanitizeList(profile.preferredChannels)
    },
    deps
  );
};
