import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * **Configuration:**
 * - LOG_LEVEL: error, warn, info, debug, silent (defaults to 'info', 'silent' under Jest)
 * - NODE_ENV: 'development' pretty-prints through pino-pretty, anything else writes JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../shared/logger';
 *
 * logger.warn({
 *   msg: 'Skipping birthday record',
 *   record: 'row 4',
 *   error: error.message,
 * });
 * ```
 *
 * The CLI writes its results to stdout itself; this logger is for diagnostics only
 * and goes to stderr so it never interleaves with printed dates.
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const logLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino(
  {
    level: logLevel,
    // pino-pretty runs in a worker thread, so it stays out of tests and piped runs
    transport: isDevelopment
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
    base: {
      env: process.env.NODE_ENV || 'production',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isDevelopment ? undefined : pino.destination(2)
);

export type Logger = typeof logger;
