import { SubscriberProfile } from '../domain/types';
import { createDefaultRegistry } from '../notifiers/registry';
import { NotificationEventLog } from './eventLog';
import { IdentityKey, NotificationHub } from './notificationHub';
import { Subscriber, createSubscriber } from './subscriber';

export const notifierRegistry = createDefaultRegistry();
export const eventLog = new NotificationEventLog();

export const createNotificationHub = (identityKey?: IdentityKey): NotificationHub =>
  new NotificationHub(eventLog, identityKey);

export const registerSubscriber = (profile: SubscriberProfile): Subscriber =>
  createSubscriber(profile, { registry: notifierRegistry, eventLog });
