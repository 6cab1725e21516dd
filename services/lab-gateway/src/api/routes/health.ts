import { Router, type NextFunction, type Request, type Response } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - Aggregates component checks
 * @returns Express router with liveness, detailed and readiness endpoints
 */
export function createHealthRoutes(healthMonitor: HealthMonitor): Router {
  const router = Router();

  /**
   * Liveness: answers as long as the process does
   */
  router.get('/health', (_req: Request, res: Response): void => {
    res.json(healthMonitor.basic());
  });

  /**
   * Per-component breakdown
   */
  router.get('/health/detailed', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await healthMonitor.detailed());
    } catch (error: unknown) {
      next(error);
    }
  });

  /**
   * Readiness: 503 only when the service cannot serve any path
   */
  router.get('/ready', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const readiness = await healthMonitor.ready();
      res.status(readiness.ready ? 200 : 503).json(readiness);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
