import pino from 'pino';
import config from '../config/env';
import { isoNow } from './time';

// Timestamps follow the configured zone so log lines line up with event timestamps.
const logger = pino({
  level: config.logLevel,
  base: undefined,
  timestamp: () => `,"time":"${isoNow()}"`
});

export default logger;
