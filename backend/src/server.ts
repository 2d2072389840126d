import dotenv from 'dotenv';
import { createApp } from './app';
import { buildConfig } from './config/env';
import { closeDatabase, getDatabase } from './config/database';
import { createServices } from './container';
import { seedDemoData } from './database/seed';
import { AppointmentModel } from './models/Appointment';
import { PatientModel } from './models/Patient';
import logger from './utils/logger';

// Load environment variables
dotenv.config();

const config = buildConfig(process.env);

// Initialize database connection
const database = getDatabase(config.databasePath);
logger.info('Database initialized successfully', { mode: database.mode });

const services = createServices(config, database);

if (config.seedDemoData) {
  try {
    seedDemoData(
      new PatientModel(database.db),
      new AppointmentModel(database.db, config.timeZone),
      config.timeZone,
      services.now()
    );
  } catch (error) {
    logger.error('Failed to seed demo data', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

const app = createApp(services);

// Start server
const server = app.listen(config.port, config.host, () => {
  logger.info('Server started successfully', {
    host: config.host,
    port: config.port,
    environment: config.nodeEnv,
    nodeVersion: process.version,
    sms: services.sms.channel,
    maps: services.maps.mode,
    store: database.mode,
    timeZone: config.timeZone,
  });
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  server.close(() => {
    closeDatabase();
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', {
    message: error.message,
    stack: error.stack,
  });

  // Exit process (let process manager restart it)
  process.exit(1);
});

export default server;
