import { Notifier } from './types';

export const createSmsNotifier = (): Notifier => ({
  key: 'sms',
  send(message, recipient) {
    return {
      channel: 'sms',
      destination: recipient.phone,
      message,
      text: `[SMS] To: ${recipient.phone} | Message: ${message}`
    };
  }
});
