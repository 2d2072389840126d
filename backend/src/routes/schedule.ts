import { Router } from 'express';
import { AppServices } from '../container';
import { createScheduleController } from '../controllers/scheduleController';
import { requireToken } from '../middleware/auth';

/**
 * Schedule Routes
 * /schedule/* and /appointments/*
 */

export function createScheduleRoutes(services: AppServices): Router {
  const router = Router();
  const scheduleController = createScheduleController(services);

  router.use(['/schedule', '/appointments'], requireToken(services.config.debugToken));

  // GET /schedule?date=2024-01-05&therapist=Kim&optimize=true
  router.get('/schedule', scheduleController.getSchedule);

  // POST /schedule/optimize  { date, therapist }
  router.post('/schedule/optimize', scheduleController.optimizeSchedule);

  // POST /appointments
  router.post('/appointments', scheduleController.createAppointment);

  // PUT /appointments/:id/status
  router.put('/appointments/:id/status', scheduleController.updateAppointmentStatus);

  return router;
}
