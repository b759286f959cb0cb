import { Notifier } from './types';

export const createEmailNotifier = (): Notifier => ({
  key: 'email',
  send(message, recipient) {
    return {
      channel: 'email',
      destination: recipient.email,
      message,
      text: `[EMAIL] To: ${recipient.email} | Message: ${message}`
    };
  }
});
