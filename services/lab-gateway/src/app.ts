import express, { type Express } from 'express';
import { setupRoutes } from './api/routes/index.js';
import { createLabClient, type LabClient } from './clients/lab-client.js';
import type { GatewayConfig } from './config/environment.js';
import { requestContext } from './middleware/request-context.js';
import { ErrorHandler, notFoundHandler } from './monitoring/error-handler.js';
import { createHealthMonitor, type HealthMonitor } from './monitoring/health-monitor.js';
import type { ExecutionEventSink } from './services/event-sink.js';
import { ExecutionRouter } from './services/execution-router.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface GatewayOverrides {
  labClient?: LabClient;
  executionRouter?: ExecutionRouter;
  healthMonitor?: HealthMonitor;
  eventSink?: ExecutionEventSink;
  logger?: Logger;
}

export interface Gateway {
  app: Express;
  labClient: LabClient;
  executionRouter: ExecutionRouter;
  healthMonitor: HealthMonitor;
  logger: Logger;
}

/**
 * Wire the gateway from a loaded configuration. Tests pass overrides to
 * swap the Lab client, the router or the health monitor for in-process doubles.
 */
export function createGateway(config: GatewayConfig, overrides: GatewayOverrides = {}): Gateway {
  const logger = overrides.logger ?? silentLogger;
  const labClient = overrides.labClient ?? createLabClient(config, logger);
  const executionRouter =
    overrides.executionRouter ?? new ExecutionRouter(labClient, { logger, eventSink: overrides.eventSink });
  const healthMonitor = overrides.healthMonitor ?? createHealthMonitor(config, labClient, logger);
  const errorHandler = new ErrorHandler({ logger, exposeStack: config.nodeEnv === 'development' });

  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(requestContext());
  app.use(express.json({ limit: '1mb' }));

  setupRoutes(app, config.urlPrefix, {
    executionRouter,
    healthMonitor,
    labClient,
    modelPolicy: config,
    logger,
  });

  // 404 handler for undefined routes
  app.use(notFoundHandler());

  // Error handling middleware (must be last)
  app.use(errorHandler.middleware());

  return { app, labClient, executionRouter, healthMonitor, logger };
}
