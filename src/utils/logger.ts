import winston from 'winston';
import * as Sentry from '@sentry/node';

/**
 * Winston logger configuration for structured logging
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }
        return msg;
      }),
    ),
  }),
];

// Only add file transport outside of tests
if (process.env.NODE_ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: 'app.log' }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'batch-media-downloader' },
  transports,
});

/**
 * Log a batch-level operation
 */
export function logOperation(
  operation: string,
  details?: Record<string, unknown>,
): void {
  logger.info(operation, details);
}

/**
 * Log an unexpected error with stack trace and forward it to Sentry
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}
