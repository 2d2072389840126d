import { Router } from 'express';
import { AppServices } from '../container';
import { createAdminController } from '../controllers/adminController';
import { requireToken } from '../middleware/auth';

/**
 * Admin Routes
 * /admin/*
 */

export function createAdminRoutes(services: AppServices): Router {
  const router = Router();
  const adminController = createAdminController(services);

  // All admin routes require the debug token
  router.use(requireToken(services.config.debugToken));

  router.get('/messages', adminController.listMessages);
  router.get('/intents', adminController.intents);
  router.get('/export.csv', adminController.exportCsv);

  return router;
}
