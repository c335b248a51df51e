/**
 * Logger factory
 *
 * Each run builds one logger and hands it to the components that need it.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import pino, { type Logger, type Level } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: Level;
  /** Log file path; omit to log to stdout only */
  file?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level, file, name = 'milewatcher' } = options;

  const streams: pino.StreamEntry[] = [{ level, stream: process.stdout }];

  if (file) {
    mkdirSync(dirname(file), { recursive: true });
    streams.push({ level, stream: pino.destination({ dest: file, sync: true }) });
  }

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      // call sites log failures under `error`
      serializers: { error: pino.stdSerializers.err },
    },
    pino.multistream(streams)
  );
}
