import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_HEADER = 'X-Request-Id';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Assigns a correlation id to every request: the caller's X-Request-Id when
 * it is usable, otherwise a fresh UUID. Echoed back on the response.
 */
export function requestContext() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && incoming.length <= MAX_REQUEST_ID_LENGTH && /^[\w.:-]+$/.test(incoming) ? incoming : uuidv4();

    res.locals['requestId'] = requestId;
    res.locals['startedAt'] = Date.now();
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}

export function getRequestId(res: Response): string | undefined {
  const value: unknown = res.locals['requestId'];
  return typeof value === 'string' ? value : undefined;
}

export function getStartedAt(res: Response): number {
  const value: unknown = res.locals['startedAt'];
  return typeof value === 'number' ? value : Date.now();
}
