/**
 * Run context
 *
 * Wires the store, sources and classifier for one pipeline run
 */

import type { Config } from './config/index.js';
import { closeDatabase, openDatabase, PostStore } from './db/index.js';
import { PromotionClassifier, createOpenAiGenerator } from './filter/index.js';
import { runPipeline } from './pipeline.js';
import { HtmlFetcher, createSources } from './scraper/index.js';
import type { Logger } from './utils/logger.js';
import type { PipelineResult } from './types/index.js';

/**
 * Open the store, run both phases, close the store
 */
export async function executeRun(config: Config, logger: Logger): Promise<PipelineResult> {
  const db = openDatabase(config.database.path, logger);

  try {
    const store = new PostStore(db, logger);
    if (!store.ensureSchema()) {
      throw new Error(`Could not initialize database schema at ${config.database.path}`);
    }

    const before = store.getStats();
    if (before) {
      logger.info(
        {
          totalSources: before.totalSources,
          totalPosts: before.totalPosts,
          byState: before.postsByState,
          lastProcessed: before.lastProcessedAt?.toISOString() ?? 'never',
        },
        'Database ready'
      );
    }

    const fetcher = new HtmlFetcher(
      {
        userAgent: config.scraper.userAgent,
        timeout: config.scraper.timeout,
        rateLimitMs: config.scraper.rateLimitMs,
      },
      logger
    );
    const sources = createSources(config.scraper.sources, { fetcher, logger });
    const classifier = new PromotionClassifier(
      createOpenAiGenerator(config.openai),
      logger,
      config.retry
    );

    return await runPipeline(
      { store, sources, classifier, logger },
      {
        promoDescription: config.classifier.promoDescription,
        maxPostsPerSource: config.scraper.maxPostsPerSource,
      }
    );
  } finally {
    closeDatabase(db, logger);
  }
}
