import { ChannelTag, isChannelTag } from '../domain/types';
import { createEmailNotifier } from './emailNotifier';
import { UnknownChannelError } from './errors';
import { createPushNotifier } from './pushNotifier';
import { createSmsNotifier } from './smsNotifier';
import { ChannelResolution, NotifierFactory } from './types';

export const normalizeChannelTag = (tag: string): string => tag.trim().toLowerCase();

export class NotifierRegistry {
  private readonly factories = new Map<ChannelTag, NotifierFactory>();

  register(key: ChannelTag, factory: NotifierFactory): void {
    this.factories.set(key, factory);
  }

  has(tag: string): boolean {
    const normalized = normalizeChannelTag(tag);
    return isChannelTag(normalized) && this.factories.has(normalized);
  }

  channels(): ChannelTag[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Looks up the sender for a channel tag, ignoring case and surrounding whitespace.
   * Unsupported tags come back as an {@link UnknownChannelError} carrying the tag as given.
   */
  resolve(tag: string): ChannelResolution {
    const normalized = normalizeChannelTag(tag);
    const factory = isChannelTag(normalized) ? this.factories.get(normalized) : undefined;
    if (!factory) {
      return { ok: false, error: new UnknownChannelError(tag) };
    }
    return { ok: true, notifier: factory() };
  }
}

export const createDefaultRegistry = (): NotifierRegistry => {
  const registry = new NotifierRegistry();
  registry.register('email', createEmailNotifier);
  registry.register('sms', createSmsNotifier);
  registry.register('push', createPushNotifier);
  return registry;
};
