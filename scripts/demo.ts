import logger from '../src/utils/logger';
import { renderMetrics } from '../src/utils/metrics';
import { createNotificationHub, registerSubscriber } from '../src/services/container';

const run = async (): Promise<void> => {
  const hub = createNotificationHub();

  const ana = registerSubscriber({
    displayName: 'Ana',
    email: 'ana@example.com',
    phone: '+15550000001',
    preferredChannels: ['email']
  });
  const luis = registerSubscriber({
    displayName: 'Luis',
    email: 'luis@example.com',
    phone: '+15550000002',
    preferredChannels: ['sms', 'push']
  });
  const carla = registerSubscriber({
    displayName: 'Carla',
    email: 'carla@example.com',
    phone: '+15550000003',
    preferredChannels: ['push', 'email', 'whatsapp']
  });

  ana.subscribe(hub);
  luis.subscribe(hub);
  hub.add(carla);

  hub.broadcast('New release available: version 1.2.0');

  luis.unsubscribe(hub);
  hub.broadcast('Reminder: scheduled maintenance tomorrow at 02:00 AM.');

  process.stdout.write(await renderMetrics());
};

run().catch((error) => {
  logger.error({ error }, 'Notification demo failed');
  process.exitCode = 1;
});
