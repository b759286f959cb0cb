import { Counter, Registry } from 'prom-client';

export const register = new Registry();

export const deliveryCounter = new Counter({
  name: 'notification_deliveries_total',
  help: 'Messages handed to a channel sender',
  labelNames: ['channel'] as const,
  registers: [register]
});

export const unknownChannelCounter = new Counter({
  name: 'notification_unknown_channels_total',
  help: 'Preferred channel tags that could not be resolved',
  registers: [register]
});

export const broadcastCounter = new Counter({
  name: 'notification_broadcasts_total',
  help: 'Broadcasts dispatched to at least one subscriber',
  registers: [register]
});

export const renderMetrics = (): Promise<string> => register.metrics();
