import type { NextFunction, Request, Response } from 'express';
import { ClientInputError, GatewayError, InternalRoutingError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { getRequestId } from '../middleware/request-context.js';

export interface ErrorResponseBody {
  error: string;
  message: string;
  reason?: string;
  issues?: unknown[];
  requestId?: string;
  stack?: string;
}

export interface ErrorHandlerOptions {
  logger?: Logger;
  /** Include stack traces in responses (development only) */
  exposeStack?: boolean;
}

export class ErrorHandler {
  private readonly logger: Logger;
  private readonly exposeStack: boolean;

  constructor(options: ErrorHandlerOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'error-handler' });
    this.exposeStack = options.exposeStack ?? false;
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const normalized = this.normalize(error);
      const requestId = getRequestId(res);
      this.logError(normalized, req, requestId);

      const body: ErrorResponseBody = {
        error: normalized.code,
        message: normalized.message,
        ...(normalized instanceof ClientInputError
          ? { reason: normalized.reason, ...(normalized.issues.length > 0 ? { issues: normalized.issues } : {}) }
          : {}),
        ...(requestId ? { requestId } : {}),
        ...(this.exposeStack && normalized.stack ? { stack: normalized.stack } : {}),
      };

      res.status(normalized.statusCode).json(body);
    };
  }

  /**
   * Map anything thrown into the gateway error taxonomy.
   */
  normalize(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    if (isBodyParseError(error)) {
      return new ClientInputError('malformed_json', 'Request body is not valid JSON');
    }
    const message = error instanceof Error ? error.message : 'Unexpected error';
    const wrapped = new GatewayError(message, 'internal_error', 500);
    if (error instanceof Error && error.stack) {
      wrapped.stack = error.stack;
    }
    return wrapped;
  }

  private logError(error: GatewayError, req: Request, requestId: string | undefined): void {
    const context = { requestId, method: req.method, url: req.originalUrl, code: error.code };

    if (error instanceof InternalRoutingError || error.statusCode >= 500) {
      this.logger.error({ ...context, err: error }, error.message);
    } else {
      this.logger.warn(context, error.message);
    }
  }
}

// body-parser marks JSON syntax errors with type "entity.parse.failed"
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function notFoundHandler() {
  return (req: Request, res: Response): void => {
    res.status(404).json({
      error: 'not_found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
    });
  };
}
