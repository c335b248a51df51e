/**
 * MileWatcher
 *
 * Batch run that:
 * 1. Scrapes the configured travel-deals sources for new posts
 * 2. Stores new posts in the local SQLite database
 * 3. Fetches each unprocessed post and asks a language model whether it
 *    describes the configured mileage-transfer promotion
 *
 * Usage:
 *   node dist/index.js   - Run both phases once and exit
 */

import { loadConfig, type Config } from './config/index.js';
import { executeRun } from './context.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    createLogger({ level: 'info' }).fatal({ error }, 'Invalid configuration');
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logging.level, file: config.logging.file });
  logger.info({ env: config.app.env, version: config.app.version }, 'MileWatcher started');

  try {
    const result = await executeRun(config, logger);

    logger.info('Run Complete:');
    logger.info(`  Discovered: ${result.discovered} posts`);
    logger.info(`  Inserted:   ${result.inserted} posts`);
    logger.info(`  Analyzed:   ${result.analyzed} posts`);
    logger.info(`  Relevant:   ${result.relevant} posts`);
    if (result.errors > 0) {
      logger.info(`  Errors:     ${result.errors}`);
    }
    logger.info(`  Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
  } catch (error) {
    logger.fatal({ error }, 'Run failed');
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
