/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Sources
  SOURCES_CONFIG: z.string().default('./urls_config.json'),

  // Storage
  DATA_DIR: z.string().default('./data'),
  REPORT_DIR: z.string().default('./result'),

  // Crawling
  MAX_PAGES: z.coerce.number().int().positive().optional(),
  PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FETCH_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().default('./logs/crawler.log'),

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 9 * * *'),
  TZ: z.string().default('Asia/Shanghai'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
