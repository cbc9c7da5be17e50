/**
 * Structured logger (pino)
 *
 * Writes to stdout, and to LOG_FILE outside of tests.
 */

import pino, { type Logger, type StreamEntry } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  const level = config.logging.level;
  const streams: StreamEntry[] = [{ level: 'trace', stream: process.stdout }];

  if (config.app.env !== 'test' && level !== 'silent') {
    streams.push({
      level: 'trace',
      stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
    });
  }

  return pino(
    {
      name: config.app.name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

export const logger = createLogger();
