import { Router, type NextFunction, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ExecutionRouter } from '../../services/execution-router.js';
import { parseExecutionRequest, type ModelPolicy } from '../schemas/execution.js';
import { getRequestId, getStartedAt } from '../../middleware/request-context.js';

/**
 * Create execution routes
 * @param executionRouter - Dispatches validated requests to the Lab Service
 * @param modelPolicy - Allowed models and the default one
 * @returns Express router with the execute endpoint
 */
export function createExecuteRoutes(executionRouter: ExecutionRouter, modelPolicy: ModelPolicy): Router {
  const router = Router();

  /**
   * Run a prompt as a simple inference or an orchestrated workflow.
   * Upstream failures still answer 200 with status "failure".
   */
  router.post('/execute', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const request = parseExecutionRequest(req.body, modelPolicy);
      const result = await executionRouter.route(request, {
        requestId: getRequestId(res) ?? uuidv4(),
        startedAt: getStartedAt(res),
      });
      res.json(result);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
