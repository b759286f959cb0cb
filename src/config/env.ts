import * as dotenv from 'dotenv';

dotenv.config();

export const OPTIONAL_DEFAULTS = Object.freeze({
  nodeEnv: 'development',
  timezone: 'UTC',
  logLevel: 'info',
  eventHistoryLimit: 1000,
  metricsEnabled: true
});

export interface AppConfig {
  env: string;
  timezone: string;
  logLevel: string;
  eventHistoryLimit: number;
  metrics: {
    enabled: boolean;
  };
}

const numeric = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = (value ?? String(fallback)).toLowerCase();
  return normalized === 'true';
};

const config: AppConfig = {
  env: process.env.NODE_ENV || OPTIONAL_DEFAULTS.nodeEnv,
  timezone: process.env.TZ || OPTIONAL_DEFAULTS.timezone,
  logLevel: process.env.LOG_LEVEL || OPTIONAL_DEFAULTS.logLevel,
  eventHistoryLimit: Math.max(
    1,
    Math.floor(numeric(process.env.EVENT_HISTORY_LIMIT, OPTIONAL_DEFAULTS.eventHistoryLimit))
  ),
  metrics: {
    enabled: toBoolean(process.env.METRICS_ENABLED, OPTIONAL_DEFAULTS.metricsEnabled)
  }
};

export default config;
