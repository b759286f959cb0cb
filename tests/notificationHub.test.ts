process.env.LOG_LEVEL = 'silent';

import assert from 'assert';
import type { SubscriberProfile } from '../src/domain/types';

(async () => {
  const { createDefaultRegistry } = await import('../src/notifiers/registry');
  const { NotificationEventLog } = await import('../src/services/eventLog');
  const { NotificationHub } = await import('../src/services/notificationHub');
  const { createSubscriber } = await import('../src/services/subscriber');

  const eventLog = new NotificationEventLog({ metricsEnabled: false });
  const deps = { registry: createDefaultRegistry(), eventLog };
  const build = (profile: SubscriberProfile) => createSubscriber(profile, deps);

  const hub = new NotificationHub(eventLog);
  const a = build({ displayName: 'A', email: 'a@example.com', phone: '+15550000001', preferredChannels: ['email'] });
  const b = build({
    displayName: 'B',
    email: 'b@example.com',
    phone: '+15550000002',
    preferredChannels: ['sms', 'push']
  });

  const skipped = hub.broadcast('nobody home');
  assert.deepStrictEqual(skipped, { message: 'nobody home', recipients: 0, deliveries: 0, unknownChannels: 0 });
  assert.strictEqual(eventLog.listByType('broadcast_skipped').length, 1, 'Empty hub should report a skipped broadcast');
  assert.strictEqual(eventLog.listByType('broadcast').length, 0);

  assert.strictEqual(hub.add(a), true);
  assert.strictEqual(hub.add(a), false, 'Second add should be a no-op');
  assert.strictEqual(hub.size, 1);
  assert.strictEqual(eventLog.listByType('subscribed').length, 1);
  assert.strictEqual(eventLog.listByType('already_subscribed').length, 1);

  const sameEmail = build({
    displayName: 'A again',
    email: 'A@Example.com',
    phone: '+15550000009',
    preferredChannels: ['sms']
  });
  assert.strictEqual(hub.add(sameEmail), false, 'Identity defaults to the email address');
  assert.strictEqual(hub.size, 1);

  assert.strictEqual(b.subscribe(hub), true);
  assert.strictEqual(hub.size, 2);

  eventLog.clear();
  const first = hub.broadcast('v1.2.0');
  assert.deepStrictEqual(first, { message: 'v1.2.0', recipients: 2, deliveries: 3, unknownChannels: 0 });
  assert.deepStrictEqual(
    eventLog.listByType('delivery').map((event) => `${event.subscriber.name}:${event.channel}:${event.destination}`),
    ['A:email:a@example.com', 'B:sms:+15550000002', 'B:push:B']
  );
  assert.strictEqual(a.lastMessage, 'v1.2.0');
  assert.strictEqual(b.lastMessage, 'v1.2.0');

  assert.strictEqual(b.unsubscribe(hub), true);
  assert.strictEqual(hub.has(b), false);
  assert.strictEqual(hub.size, 1);

  eventLog.clear();
  hub.broadcast('maintenance');
  assert.deepStrictEqual(
    eventLog.listByType('delivery').map((event) => `${event.subscriber.name}:${event.channel}`),
    ['A:email'],
    'Only current members should receive the broadcast'
  );
  assert.strictEqual(a.lastMessage, 'maintenance');
  assert.strictEqual(b.lastMessage, 'v1.2.0', 'Removed subscriber keeps its last message');

  const stranger = build({ displayName: 'C', email: 'c@example.com', phone: '', preferredChannels: ['email'] });
  assert.doesNotThrow(() => hub.remove(stranger));
  assert.strictEqual(hub.remove(stranger), false);
  assert.strictEqual(hub.size, 1);
  assert.strictEqual(eventLog.listByType('not_subscribed').length, 2);

  const byName = new NotificationHub(eventLog, (subscriber) => subscriber.displayName);
  const zoe = build({ displayName: 'Zoe', email: 'shared@example.com', phone: '', preferredChannels: ['push'] });
  const ben = build({ displayName: 'Ben', email: 'shared@example.com', phone: '', preferredChannels: ['push'] });
  assert.strictEqual(byName.add(zoe), true);
  assert.strictEqual(byName.add(ben), true, 'Custom identity key should decide membership');
  assert.deepStrictEqual(
    byName.subscribers().map((subscriber) => subscriber.displayName),
    ['Zoe', 'Ben']
  );

  // Removing a member mid-broadcast must not change who receives the current message.
  const stop = eventLog.onEvent((event) => {
    if (event.type === 'delivery' && event.destination === 'Zoe') {
      byName.remove(ben);
    }
  });
  eventLog.clear();
  const summary = byName.broadcast('order');
  stop();

  assert.strictEqual(summary.recipients, 2);
  assert.deepStrictEqual(
    eventLog.listByType('delivery').map((event) => event.destination),
    ['Zoe', 'Ben']
  );
  assert.strictEqual(byName.size, 1);

  const isolated = new NotificationHub(eventLog);
  const faxOnly = build({ displayName: 'Fax', email: 'fax@example.com', phone: '', preferredChannels: ['fax'] });
  const good = build({ displayName: 'Good', email: 'good@example.com', phone: '', preferredChannels: ['email'] });
  isolated.add(faxOnly);
  isolated.add(good);

  eventLog.clear();
  const mixed = isolated.broadcast('status');
  assert.deepStrictEqual(mixed, { message: 'status', recipients: 2, deliveries: 1, unknownChannels: 1 });
  assert.deepStrictEqual(
    eventLog.listByType('delivery').map((event) => `${event.subscriber.name}:${event.channel}`),
    ['Good:email'],
    'A bad preference must not stop delivery to later members'
  );
  assert.strictEqual(eventLog.listByType('unknown_channel').length, 1);
  assert.strictEqual(good.lastMessage, 'status');
  assert.strictEqual(faxOnly.lastMessage, 'status');

  console.log('notificationHub.test.ts passed');
})();
