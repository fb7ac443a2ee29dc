// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs.
//      Under test the logger is silent unless LOG_LEVEL asks otherwise.

import pino, { type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
};

function createLogger(): Logger {
  // Try pretty transport in development; fall back to standard if unavailable.
  if (isDev) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      });
    } catch {
      return pino(baseOptions);
    }
  }
  return pino(baseOptions);
}

const logger: Logger = createLogger();

export type { Logger };
export default logger;
