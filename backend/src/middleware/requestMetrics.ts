import { Request, Response, NextFunction } from 'express';
import { RequestMetrics } from '../services/metricsService';
import { loggers } from '../utils/logger';

/**
 * Request logging + latency/error counters
 */
export function requestMetrics(metrics: RequestMetrics) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    loggers.httpRequest(req.method, req.path, req.ip);

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      metrics.observe(duration / 1000);
      if (res.statusCode >= 500) {
        metrics.recordError();
      }
      loggers.httpResponse(req.method, req.path, res.statusCode, duration);
    });

    next();
  };
}
