import { Router } from 'express';
import { AppServices } from '../container';
import { createHealthController } from '../controllers/healthController';

/**
 * Health Routes
 * /, /healthz, /metrics, /metrics.prom
 */

export function createHealthRoutes(services: AppServices): Router {
  const router = Router();
  const healthController = createHealthController(services);

  router.get('/', healthController.root);
  router.get('/healthz', healthController.healthz);
  router.get('/metrics', healthController.metricsJson);
  router.get('/metrics.prom', healthController.metricsProm);

  return router;
}
