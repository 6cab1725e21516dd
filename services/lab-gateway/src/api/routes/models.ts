import { Router, type NextFunction, type Request, type Response } from 'express';
import type { LabClient } from '../../clients/lab-client.js';
import type { ModelPolicy } from '../schemas/execution.js';
import { getRequestId } from '../../middleware/request-context.js';
import { LabServiceError } from '../../types/errors.js';

/**
 * Create model listing routes
 * @param labClient - Used to ask the Lab Service which models it serves
 * @param modelPolicy - Models this gateway accepts
 */
export function createModelRoutes(labClient: LabClient, modelPolicy: ModelPolicy): Router {
  const router = Router();

  router.get('/models', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    const base = {
      default_model: modelPolicy.defaultModel,
      allowed: modelPolicy.allowedModels,
    };

    try {
      const upstream = await labClient.listModels({ requestId: getRequestId(res) });
      res.json({ ...base, upstream });
    } catch (error: unknown) {
      if (error instanceof LabServiceError) {
        res.json({ ...base, upstream: null, upstream_error: error.message });
        return;
      }
      next(error);
    }
  });

  return router;
}
