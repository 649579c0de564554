/**
 * Logger
 * Shared pino instance, configured the same way as the server's logger
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export function loggerOptions(): LoggerOptions {
  return {
    level: process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  };
}

export const logger: Logger = pino({ name: 'txscope', ...loggerOptions() });
