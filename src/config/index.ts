/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'scrapper',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  server: {
    host: env.HOST,
    port: env.PORT,
  },

  browser: {
    headless: env.BROWSER_HEADLESS,
    userAgent: env.USER_AGENT,
    viewport: { width: 1920, height: 1080 },
  },

  scraper: {
    timeout: env.SCRAPE_TIMEOUT_MS,
    rateLimitMs: env.SCRAPE_RATE_LIMIT_MS,
    defaultMaxPages: env.DEFAULT_MAX_PAGES,
    maxConcurrentRuns: env.MAX_CONCURRENT_RUNS,
  },

  database: {
    url: env.DATABASE_URL,
  },

  projects: {
    seedFile: env.PROJECTS_FILE,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    timezone: env.TZ,
  },

  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },

  api: {
    defaultRecordLimit: 50,
    maxRecordLimit: 500,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
