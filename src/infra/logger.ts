import winston from 'winston';
import type { Env } from './env.js';

type LoggerOptions = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'> & { silent?: boolean };

/**
 * Structured logger
 * Logs to console in development, file + console in production
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (options.NODE_ENV === 'production' && options.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: options.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: options.LOG_LEVEL,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Process-wide logger instance (replaced in server.ts once env is validated)
 */
export let logger: winston.Logger = createLogger({
  NODE_ENV: 'development',
  LOG_LEVEL: 'info',
  LOG_FILE: undefined,
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
