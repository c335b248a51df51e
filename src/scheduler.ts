/**
 * Scheduler
 *
 * Runs the pipeline on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { loadConfig, type Config } from './config/index.js';
import { executeRun } from './context.js';
import { createLogger, type Logger } from './utils/logger.js';

export class Scheduler {
  private task: ScheduledTask | null = null;
  private isRunning = false;
  private readonly logger: Logger;

  constructor(
    private readonly config: Config,
    logger: Logger,
    private readonly run: (config: Config, logger: Logger) => Promise<unknown> = executeRun
  ) {
    this.logger = logger.child({ component: 'scheduler' });
  }

  /**
   * Execute one run unless the previous one is still going
   */
  async tick(): Promise<boolean> {
    if (this.isRunning) {
      this.logger.warn('Pipeline already running, skipping this execution');
      return false;
    }

    this.isRunning = true;
    const startTime = new Date();
    this.logger.info({ startTime: startTime.toISOString() }, 'Scheduled run starting');

    try {
      const result = await this.run(this.config, this.logger);
      this.logger.info(
        { startTime: startTime.toISOString(), endTime: new Date().toISOString(), result },
        'Scheduled run completed'
      );
    } catch (error) {
      this.logger.error({ error }, 'Scheduled run failed');
    } finally {
      this.isRunning = false;
    }
    return true;
  }

  start(): void {
    const { cronExpression, timezone } = this.config.scheduler;

    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression: ${cronExpression}`);
    }

    this.task = cron.schedule(
      cronExpression,
      () => {
        void this.tick();
      },
      { timezone }
    );

    this.logger.info({ cronExpression, timezone }, 'Scheduler started');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info('Scheduler stopped');
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level, file: config.logging.file });
  const scheduler = new Scheduler(config, logger);

  logger.info('Running initial pipeline...');
  await scheduler.tick();
  scheduler.start();

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    scheduler.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Run if called directly
if (process.argv[1]?.endsWith('scheduler.ts') || process.argv[1]?.endsWith('scheduler.js')) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
