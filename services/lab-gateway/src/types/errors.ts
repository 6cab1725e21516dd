import type { ZodIssue } from 'zod';

/**
 * Base class for every error the gateway raises on purpose.
 * `code` is machine-readable and lands in error responses.
 */
export class GatewayError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, 'configuration_error', 500, details);
  }
}

export type ClientInputReason =
  | 'missing_field'
  | 'invalid_field'
  | 'unsupported_execution_type'
  | 'model_not_allowed'
  | 'malformed_json';

/** Bad input from the caller; rejected before any upstream call. */
export class ClientInputError extends GatewayError {
  readonly reason: ClientInputReason;
  readonly issues: ZodIssue[];

  constructor(reason: ClientInputReason, message: string, issues: ZodIssue[] = []) {
    super(message, 'invalid_request', 400, issues);
    this.reason = reason;
    this.issues = issues;
  }
}

/**
 * An execution type passed validation but the router has no path for it.
 * Validation should make this impossible, so it is a server fault.
 */
export class InternalRoutingError extends GatewayError {
  constructor(executionType: unknown) {
    super(`No execution path for execution_type ${JSON.stringify(executionType)}`, 'internal_routing_error', 500, {
      executionType,
    });
  }
}

/* ---------- Lab Service failures ---------- */

export type LabFailureKind = 'unreachable' | 'upstream_error' | 'malformed_response';

export abstract class LabServiceError extends GatewayError {
  abstract readonly kind: LabFailureKind;
  readonly endpoint: string;

  constructor(message: string, code: string, endpoint: string, details?: unknown) {
    super(message, code, 502, details);
    this.endpoint = endpoint;
  }
}

/** Connection refused, DNS failure or timeout. */
export class LabUnreachableError extends LabServiceError {
  readonly kind = 'unreachable';
  readonly timedOut: boolean;
  readonly attempts: number;

  constructor(endpoint: string, cause: string, timedOut: boolean, attempts: number) {
    super(
      timedOut
        ? `Lab Service did not answer ${endpoint} in time (${cause})`
        : `Lab Service is unreachable at ${endpoint} (${cause})`,
      'upstream_unreachable',
      endpoint,
      { cause, timedOut, attempts }
    );
    this.timedOut = timedOut;
    this.attempts = attempts;
  }
}

/** The Lab Service answered with a non-2xx status. */
export class LabUpstreamError extends LabServiceError {
  readonly kind = 'upstream_error';
  readonly upstreamStatus: number;
  readonly body: unknown;

  constructor(endpoint: string, upstreamStatus: number, body: unknown) {
    super(
      `Lab Service returned HTTP ${upstreamStatus} for ${endpoint}${describeBody(body)}`,
      'upstream_application_error',
      endpoint,
      { upstreamStatus }
    );
    this.upstreamStatus = upstreamStatus;
    this.body = body;
  }
}

/** 2xx answer whose body does not match the expected schema. */
export class LabMalformedResponseError extends LabServiceError {
  readonly kind = 'malformed_response';
  readonly issues: ZodIssue[];

  constructor(endpoint: string, issues: ZodIssue[]) {
    const fields = issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    super(`Lab Service sent a malformed response for ${endpoint}: ${fields}`, 'upstream_malformed_response', endpoint, {
      issues,
    });
    this.issues = issues;
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'string' && body.length > 0) {
    return `: ${body.slice(0, 200)}`;
  }
  if (body && typeof body === 'object') {
    const detail = 'detail' in body ? body.detail : 'error' in body ? body.error : undefined;
    if (typeof detail === 'string') {
      return `: ${detail}`;
    }
  }
  return '';
}
