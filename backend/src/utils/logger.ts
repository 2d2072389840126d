import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Winston Logger Configuration
 * Structured logging with console and file transports
 */

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(
    ({ timestamp, level, message, stack, ...metadata }) => {
      let msg = `${timestamp} [${level.toUpperCase()}]: ${message}`;

      // Add stack trace for errors
      if (stack) {
        msg += `\n${stack}`;
      }

      // Add metadata if present
      if (Object.keys(metadata).length > 0) {
        msg += `\n${JSON.stringify(metadata, null, 2)}`;
      }

      return msg;
    }
  )
);

// Define transports
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      logFormat
    ),
  }),
];

if (process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false') {
  const logsDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: logFormat,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: logFormat,
    })
  );
}

// Create logger instance
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports,
  exitOnError: false,
});

// Keep test output quiet
if (process.env.NODE_ENV === 'test') {
  logger.silent = true;
}

/**
 * Helper functions for common logging scenarios
 */

export const loggers = {
  /**
   * Log outbound call to an SMS or maps provider
   */
  providerRequest: (provider: string, operation: string, details?: Record<string, unknown>) => {
    logger.debug('Provider Request', {
      provider,
      operation,
      ...details,
    });
  },

  /**
   * Log failed provider call. Maps failures are recoverable, so they go out as warnings.
   */
  providerError: (provider: string, operation: string, error: string, recoverable: boolean) => {
    const meta = { provider, operation, error };
    if (recoverable) {
      logger.warn('Provider Error (falling back)', meta);
    } else {
      logger.error('Provider Error', meta);
    }
  },

  /**
   * Log database operation
   */
  dbOperation: (operation: string, table: string, details?: Record<string, unknown>) => {
    logger.debug('Database Operation', {
      operation,
      table,
      details: details ? JSON.stringify(details) : undefined,
    });
  },

  /**
   * Log HTTP request
   */
  httpRequest: (method: string, path: string, ip?: string) => {
    logger.info('HTTP Request', {
      method,
      path,
      ip,
    });
  },

  /**
   * Log HTTP response
   */
  httpResponse: (method: string, path: string, statusCode: number, duration: number) => {
    logger.info('HTTP Response', {
      method,
      path,
      statusCode,
      duration: `${duration}ms`,
    });
  },
};

export default logger;
