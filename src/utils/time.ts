import { DateTime } from 'luxon';
import config from '../config/env';

const zone = config.timezone;

export const now = (): DateTime => DateTime.now().setZone(zone);

export const isoNow = (): string => now().toISO() || new Date().toISOString();
