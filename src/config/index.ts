/**
 * Application configuration
 */

import { validateEnv } from './env.js';
import { FileConfigResolver } from './paths.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = validateEnv(source);
  const paths = new FileConfigResolver(env.CONFIG_DIR);

  return {
    app: {
      name: 'milewatcher',
      version: '1.0.0',
      env: env.NODE_ENV,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseUrl: env.OPENAI_BASE_URL,
    },

    classifier: {
      promoDescription: env.PROMO_DESCRIPTION,
    },

    scraper: {
      sources: env.SOURCES,
      maxPostsPerSource: env.MAX_POSTS_PER_SOURCE,
      rateLimitMs: env.SCRAPE_RATE_LIMIT_MS,
      timeout: env.SCRAPE_TIMEOUT_MS,
      userAgent: env.USER_AGENT,
    },

    database: {
      path: paths.getFilePath(env.DB_FILE),
    },

    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE,
    },

    scheduler: {
      cronExpression: env.CRON_SCHEDULE,
      timezone: env.TZ,
    },

    retry: DEFAULT_RETRY_CONFIG,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;
export { validateEnv, envSchema, DEFAULT_PROMO_DESCRIPTION, type Env } from './env.js';
export { FileConfigResolver } from './paths.js';
