/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging shared by every package. Components prefix their
 * messages with a bracketed tag, e.g. `[ingest]`.
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['req.headers["x-terrareg-apikey"]', 'req.headers.authorization', 'req.headers.cookie'],
    censor: '[redacted]',
  },
});

export type Logger = typeof logger;
