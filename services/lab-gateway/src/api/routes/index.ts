import express, { type Application } from 'express';
import type { LabClient } from '../../clients/lab-client.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { ExecutionRouter } from '../../services/execution-router.js';
import type { Logger } from '../../utils/logger.js';
import type { ModelPolicy } from '../schemas/execution.js';
import { createExecuteRoutes } from './execute.js';
import { createHealthRoutes } from './health.js';
import { createModelRoutes } from './models.js';

export interface RouteDependencies {
  executionRouter: ExecutionRouter;
  healthMonitor: HealthMonitor;
  labClient: LabClient;
  modelPolicy: ModelPolicy;
  logger: Logger;
}

/**
 * Mount all API routes under the URL prefix
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes, e.g. /api/v1
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  const api = express.Router();

  // Health first: probes should never wait behind anything else
  api.use(createHealthRoutes(deps.healthMonitor));
  api.use(createExecuteRoutes(deps.executionRouter, deps.modelPolicy));
  api.use(createModelRoutes(deps.labClient, deps.modelPolicy));

  app.use(urlPrefix, api);

  deps.logger.debug(
    {
      urlPrefix,
      endpoints: ['/health', '/health/detailed', '/ready', '/execute', '/models'],
    },
    'API routes configured'
  );
}
