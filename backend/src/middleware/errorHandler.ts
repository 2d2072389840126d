import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';

/**
 * Custom Error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  details?: unknown;

  constructor(message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Turn a failed zod parse into a 400
 */
export function validationError(error: ZodError): AppError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new AppError('Validation failed', 400, issues);
}

/**
 * Body-parser and other http-errors style failures carry their own 4xx status
 */
function clientErrorStatus(err: Error): number | null {
  const status =
    'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function toAppError(err: Error): AppError | null {
  if (err instanceof AppError) return err;
  if (err instanceof ZodError) return validationError(err);
  const status = clientErrorStatus(err);
  return status !== null ? new AppError(err.message, status) : null;
}

/**
 * Global error handling middleware
 * Catches all errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const statusCode = appError ? appError.statusCode : 500;

  // Log error
  const meta = {
    message: err.message,
    statusCode,
    path: req.path,
    method: req.method,
    isOperational: appError?.isOperational ?? false,
  };
  if (statusCode >= 500) {
    logger.error('Error occurred', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected', meta);
  }

  // Send error response
  res.status(statusCode).json({
    status: 'error',
    message: appError ? appError.message : 'Internal Server Error',
    ...(appError?.details !== undefined && { details: appError.details }),
    ...(process.env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
  });
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    status: 'error',
    message: `Route ${req.originalUrl} not found`,
  });
}

/**
 * Async route wrapper to catch errors in async functions
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
