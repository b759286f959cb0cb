import type { ChannelDelivery, ChannelTag, Recipient } from '../domain/types';
import type { UnknownChannelError } from './errors';

export interface Notifier {
  key: ChannelTag;
  send(message: string, recipient: Recipient): ChannelDelivery;
}

export type NotifierFactory = () => Notifier;

export type ChannelResolution =
  | { ok: true; notifier: Notifier }
  | { ok: false; error: UnknownChannelError };
