/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Writes to stderr so stdout stays usable for command output.
 */

import pino, { type LevelWithSilent, type LoggerOptions } from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] || (NODE_ENV === 'test' ? 'silent' : 'info');

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'mediasync',
    env: NODE_ENV,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname,service,env',
        },
      },
    })
  : pino(options, pino.destination(2));

export type Logger = typeof logger;
export type LogLevel = LevelWithSilent;

/**
 * Create a child logger with additional context.
 * Children copy the root level at creation time, so call
 * setLogLevel() before building components.
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
