export * from './domain/types';
export { UnknownChannelError } from './notifiers/errors';
export { NotifierRegistry, createDefaultRegistry, normalizeChannelTag } from './notifiers/registry';
export type { ChannelResolution, Notifier, NotifierFactory } from './notifiers/types';
export { createEmailNotifier } from './notifiers/emailNotifier';
export { createSmsNotifier } from './notifiers/smsNotifier';
export { createPushNotifier } from './notifiers/pushNotifier';
export { NotificationEventLog } from './services/eventLog';
export type { EventLogOptions, NotificationListener } from './services/eventLog';
export { NotificationHub, emailIdentity } from './services/notificationHub';
export type { BroadcastSummary, IdentityKey } from './services/notificationHub';
export { Subscriber, createSubscriber } from './services/subscriber';
export type { ReceiveOutcome, SubscriberDependencies } from './services/subscriber';
export { createNotificationHub, eventLog, notifierRegistry, registerSubscriber } from './services/container';
export { renderMetrics } from './utils/metrics';
export { default as config } from './config/env';
