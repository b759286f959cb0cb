export const CHANNEL_TAGS = ['email', 'sms', 'push'] as const;

export type ChannelTag = (typeof CHANNEL_TAGS)[number];

export const isChannelTag = (value: string): value is ChannelTag =>
  (CHANNEL_TAGS as readonly string[]).includes(value);

export interface Recipient {
  displayName: string;
  email: string;
  phone: string;
}

export interface SubscriberProfile extends Recipient {
  /** Raw tags, in delivery order. Unsupported tags are reported at dispatch time. */
  preferredChannels: string[];
}

export interface ChannelDelivery {
  channel: ChannelTag;
  destination: string;
  message: string;
  /** Human-readable line, e.g. `[SMS] To: +5215500000000 | Message: hi` */
  text: string;
}

export interface SubscriberRef {
  name: string;
  email: string;
}

export type MembershipEventType = 'subscribed' | 'already_subscribed' | 'unsubscribed' | 'not_subscribed';

export type NotificationEventInput =
  | ({ type: 'delivery'; subscriber: SubscriberRef } & ChannelDelivery)
  | { type: 'unknown_channel'; subscriber: SubscriberRef; channel: string; message: string }
  | { [K in MembershipEventType]: { type: K; subscriber: SubscriberRef } }[MembershipEventType]
  | { type: 'broadcast'; message: string; recipients: number }
  | { type: 'broadcast_skipped'; message: string };

export type NotificationEventType = NotificationEventInput['type'];

export type NotificationEvent = NotificationEventInput & {
  id: string;
  timestamp: string;
};

export type NotificationEventOf<T extends NotificationEventType> = Extract<NotificationEvent, { type: T }>;
