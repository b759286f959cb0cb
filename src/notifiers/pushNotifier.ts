import { Notifier } from './types';

// Push targets the user's device session, addressed by display name.
export const createPushNotifier = (): Notifier => ({
  key: 'push',
  send(message, recipient) {
    return {
      channel: 'push',
      destination: recipient.displayName,
      message,
      text: `[PUSH] User: ${recipient.displayName} | Message: ${message}`
    };
  }
});
