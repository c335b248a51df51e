import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { pino } from 'pino';
import { loadConfig, type Config } from './config/index.js';
import { Scheduler } from './scheduler.js';

const logger = pino({ level: 'silent' });

describe('Scheduler', () => {
  let baseDir: string;

  function configWith(cron: string): Config {
    return loadConfig({ OPENAI_API_KEY: 'test-key', CONFIG_DIR: baseDir, CRON_SCHEDULE: cron });
  }

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'milewatcher-scheduler-'));
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: () => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new Scheduler(configWith('0 * * * *'), logger, run);

    const first = scheduler.tick();
    expect(await scheduler.tick()).toBe(false);

    finish();
    expect(await first).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('recovers after a failed run', async () => {
    const run = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce(undefined);
    const scheduler = new Scheduler(configWith('0 * * * *'), logger, run);

    expect(await scheduler.tick()).toBe(true);
    expect(await scheduler.tick()).toBe(true);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('rejects an invalid cron expression', () => {
    const scheduler = new Scheduler(configWith('not a cron'), logger, vi.fn());
    expect(() => scheduler.start()).toThrow('Invalid cron expression: not a cron');
    expect(scheduler.isActive()).toBe(false);
  });

  it('starts and stops', () => {
    const scheduler = new Scheduler(configWith('0 0 1 1 *'), logger, vi.fn());
    scheduler.start();
    expect(scheduler.isActive()).toBe(true);
    scheduler.stop();
    expect(scheduler.isActive()).toBe(false);
  });
});
