/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

export const DEFAULT_PROMO_DESCRIPTION =
  'uma promoção de transferência de milhas do banco Itaú para a Latam';

export const envSchema = z.object({
  // OpenAI
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),

  // Classification
  PROMO_DESCRIPTION: z.string().min(1).default(DEFAULT_PROMO_DESCRIPTION),

  // Scraping
  SOURCES: z
    .string()
    .default('passageiro-de-primeira')
    .transform((value) =>
      value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    ),
  MAX_POSTS_PER_SOURCE: z.coerce.number().int().min(0).default(0),
  SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(2000),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Storage
  CONFIG_DIR: z.string().default('./.config'),
  DB_FILE: z.string().default('database.db'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().default('./logs/milewatcher.log'),

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 */6 * * *'),
  TZ: z.string().default('America/Sao_Paulo'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}
