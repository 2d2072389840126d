import { Router } from 'express';
import { AppServices } from '../container';
import { createMapsController } from '../controllers/mapsController';
import { requireToken } from '../middleware/auth';

/**
 * Maps probe routes
 * /test/*
 */

export function createMapsRoutes(services: AppServices): Router {
  const router = Router();
  const mapsController = createMapsController(services);

  router.use(requireToken(services.config.debugToken));

  // GET /test/geocode?address=...
  router.get('/geocode', mapsController.testGeocode);

  // GET /test/distance?from=...&to=...
  router.get('/distance', mapsController.testDistance);

  return router;
}
