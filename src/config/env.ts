/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // HTTP server
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),

  // Storage: leave DATABASE_URL unset to keep everything in memory
  DATABASE_URL: z.string().url().optional(),
  PROJECTS_FILE: z.string().default('./projects.json'),

  // Browser
  BROWSER_HEADLESS: booleanString.default('true'),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Scraping
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().nonnegative().default(2000),
  DEFAULT_MAX_PAGES: z.coerce.number().int().positive().default(6),
  MAX_CONCURRENT_RUNS: z.coerce.number().int().positive().default(2),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().optional(),

  // Scheduling
  TZ: z.string().default('UTC'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const lines = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Environment validation failed:\n${lines.join('\n')}`);
  }

  return result.data;
}

export const env = validateEnv();
