export class UnknownChannelError extends Error {
  readonly code = 'UNKNOWN_CHANNEL';

  constructor(readonly tag: string) {
    super(`Unknown notification channel: ${tag}`);
    this.name = 'UnknownChannelError';
  }
}
