import rateLimit from 'express-rate-limit';
import { AppError } from './errorHandler';

/**
 * Per-IP throttle for the inbound simulation endpoints.
 * One limiter per app instance; both route aliases share its counter.
 */
export function createSimulateLimiter(windowMs: number, max: number) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new AppError('Too many requests', 429));
    },
  });
}
