import express, { Router } from 'express';
import { AppServices } from '../container';
import { createMessageController } from '../controllers/messageController';
import { requireToken } from '../middleware/auth';
import { createSimulateLimiter } from '../middleware/rateLimit';

/**
 * Message Routes
 * Inbound simulation, provider webhook and outbound sends
 */

export function createMessageRoutes(services: AppServices): Router {
  const router = Router();
  const messageController = createMessageController(services);
  const throttle = createSimulateLimiter(
    services.config.rateLimit.windowMs,
    services.config.rateLimit.maxSimulate
  );
  const guard = requireToken(services.config.debugToken);

  // POST /simulate-inbound  { from, body }
  router.post('/simulate-inbound', throttle, messageController.simulateInbound);
  router.post('/simulate-sms', throttle, messageController.simulateInbound);

  // POST /sms/inbound  (Twilio form post)
  router.post('/sms/inbound', express.urlencoded({ extended: false }), messageController.providerInbound);

  // POST /send  { to, body }
  router.post('/send', guard, messageController.send);
  router.post('/send-sms', guard, messageController.send);

  return router;
}
