/**
 * Structured JSON logging with Pino.js
 *
 * Production: JSON lines for log shipping
 * Development: Pretty-printed for readability
 * Test: silent
 */

import { pino } from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

const isDevelopment = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['NODE_ENV'] === 'test';

const serviceName = process.env['SERVICE_NAME'] ?? 'employee-directory-api';

const loggerOptions: LoggerOptions = {
  level: isTest ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env['NODE_ENV'] ?? 'development',
    service: serviceName,
  },
};

// Only add transport in development (production keeps raw JSON)
if (isDevelopment && !isTest) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export function createLogger(module: string): Logger {
  return baseLogger.child({ module });
}

export { baseLogger as logger };
