import express, { Application } from 'express';
import cookieParser from 'cookie-parser';
import { AppServices } from './container';
import { createCorsMiddleware } from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestMetrics } from './middleware/requestMetrics';

// Import routes
import { createHealthRoutes } from './routes/health';
import { createMessageRoutes } from './routes/messages';
import { createScheduleRoutes } from './routes/schedule';
import { createPatientRoutes } from './routes/patients';
import { createAdminRoutes } from './routes/admin';
import { createMapsRoutes } from './routes/maps';

/**
 * Express Application Setup
 */

export function createApp(services: AppServices): Application {
  const app: Application = express();

  // ===========================================
  // Middleware
  // ===========================================

  // CORS
  app.use(createCorsMiddleware(services.config.frontendUrl));

  // Body parsers
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  // Request logging and counters
  app.use(requestMetrics(services.metrics));

  // ===========================================
  // Routes
  // ===========================================

  app.use('/', createHealthRoutes(services));
  app.use('/', createMessageRoutes(services));
  app.use('/', createScheduleRoutes(services));
  app.use('/patients', createPatientRoutes(services));
  app.use('/admin', createAdminRoutes(services));
  app.use('/test', createMapsRoutes(services));

  // ===========================================
  // Error Handling
  // ===========================================

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
}
