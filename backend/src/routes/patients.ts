import { Router } from 'express';
import { AppServices } from '../container';
import { createPatientController } from '../controllers/patientController';
import { requireToken } from '../middleware/auth';

/**
 * Patient Routes
 * /patients/*
 */

export function createPatientRoutes(services: AppServices): Router {
  const router = Router();
  const patientController = createPatientController(services);

  router.use(requireToken(services.config.debugToken));

  // GET /patients?limit=100&offset=0
  router.get('/', patientController.listPatients);

  // GET /patients/:id
  router.get('/:id', patientController.getPatient);

  // POST /patients
  router.post('/', patientController.upsertPatient);

  return router;
}
