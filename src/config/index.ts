/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'gov-notice-watch',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  sources: {
    configPath: env.SOURCES_CONFIG,
  },

  crawler: {
    defaultMaxPages: 20,
    maxPagesOverride: env.MAX_PAGES,
    pageDelayMs: env.PAGE_DELAY_MS,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    userAgent: env.USER_AGENT,
  },

  storage: {
    dataDir: env.DATA_DIR,
    historyLimit: 50,
  },

  report: {
    outputDir: env.REPORT_DIR,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  retry: {
    maxAttempts: env.FETCH_MAX_RETRIES,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
