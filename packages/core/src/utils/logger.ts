/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging to stderr. stdout is left alone so the CLI can print
 * results there.
 */

import pino from 'pino';

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export type Logger = typeof logger;

/**
 * Change the root log level; child loggers created afterwards inherit it
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
