import type { LabClient } from '../clients/lab-client.js';
import type { InferencePayload, OrchestrationPayload } from '../clients/lab-schemas.js';
import { InternalRoutingError, LabServiceError, type LabFailureKind } from '../types/errors.js';
import type { ExecutionContext, ExecutionRequest, ExecutionResult, ExecutionType } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { noopEventSink, type ExecutionEvent, type ExecutionEventSink } from './event-sink.js';
import { normalizeInference, normalizeOrchestration } from './response-normalizer.js';

export type ExecutionPlan =
  | { kind: 'simple'; payload: InferencePayload }
  | { kind: 'orchestrator'; payload: OrchestrationPayload };

export interface ExecutionRouterOptions {
  logger?: Logger;
  eventSink?: ExecutionEventSink;
  /** Injected for tests; defaults to Date.now */
  now?: () => number;
}

interface DispatchOutcome {
  result: ExecutionResult;
  failure?: LabServiceError;
}

const FAILURE_PREFIX: Record<LabFailureKind, string> = {
  unreachable: 'Execution failed: the Lab Service could not be reached',
  upstream_error: 'Execution failed: the Lab Service rejected the request',
  malformed_response: 'Execution failed: the Lab Service returned an unexpected response',
};

/**
 * Turn a validated request into the tagged plan the router dispatches on.
 * Throws InternalRoutingError for an execution_type without a path.
 */
export function planExecution(request: ExecutionRequest): ExecutionPlan {
  const executionType: string = request.execution_type;

  switch (executionType) {
    case 'simple':
      return { kind: 'simple', payload: inferencePayload(request) };
    case 'orchestrator':
      return { kind: 'orchestrator', payload: orchestrationPayload(request) };
    default:
      throw new InternalRoutingError(executionType);
  }
}

// Optional tuning fields are forwarded only when the caller set them
function inferencePayload(request: ExecutionRequest): InferencePayload {
  const payload: InferencePayload = { prompt: request.prompt, model: request.model };
  if (request.strategy !== undefined) payload.strategy = request.strategy;
  if (request.temperature !== undefined) payload.temperature = request.temperature;
  if (request.max_tokens !== undefined) payload.max_tokens = request.max_tokens;
  return payload;
}

function orchestrationPayload(request: ExecutionRequest): OrchestrationPayload {
  const payload: OrchestrationPayload = {
    prompt: request.prompt,
    model: request.model,
    agents: request.agents ?? [],
    tools: request.tools ?? [],
  };
  if (request.verbose !== undefined) payload.verbose = request.verbose;
  if (request.enable_history !== undefined) payload.enable_history = request.enable_history;
  if (request.retry_on_error !== undefined) payload.retry_on_error = request.retry_on_error;
  return payload;
}

export class ExecutionRouter {
  private readonly client: LabClient;
  private readonly logger: Logger;
  private readonly eventSink: ExecutionEventSink;
  private readonly now: () => number;

  constructor(client: LabClient, options: ExecutionRouterOptions = {}) {
    this.client = client;
    this.logger = (options.logger ?? silentLogger).child({ component: 'execution-router' });
    this.eventSink = options.eventSink ?? noopEventSink;
    this.now = options.now ?? Date.now;
  }

  /**
   * Dispatch one request to the Lab Service and normalize the answer.
   * Upstream trouble comes back as a failure result; only an
   * InternalRoutingError is thrown.
   */
  async route(request: ExecutionRequest, context: ExecutionContext): Promise<ExecutionResult> {
    let plan: ExecutionPlan;
    try {
      plan = planExecution(request);
    } catch (error: unknown) {
      this.logger.error(
        { requestId: context.requestId, executionType: request.execution_type, err: error },
        'No execution path for validated request'
      );
      throw error;
    }

    const { result, failure } = await this.dispatch(plan, context);
    const latencyMs = this.now() - context.startedAt;

    const entry = { requestId: context.requestId, path: plan.kind, model: plan.payload.model, status: result.status, latencyMs };
    if (failure) {
      this.logger.warn({ ...entry, failure: failure.kind, code: failure.code, reason: failure.message }, 'Execution failed upstream');
    } else {
      this.logger.info(entry, 'Execution finished');
    }
    this.publish({
      type: 'execution.completed',
      requestId: context.requestId,
      executionType: plan.kind,
      status: result.status,
      latencyMs,
      timestamp: new Date(this.now()).toISOString(),
    });

    return result;
  }

  private async dispatch(plan: ExecutionPlan, context: ExecutionContext): Promise<DispatchOutcome> {
    const callOptions = { requestId: context.requestId };

    try {
      switch (plan.kind) {
        case 'simple': {
          const response = await this.client.callInference(plan.payload, callOptions);
          return { result: normalizeInference(response, { measuredLatencyMs: this.now() - context.startedAt }) };
        }
        case 'orchestrator': {
          const response = await this.client.callOrchestrate(plan.payload, callOptions);
          return { result: normalizeOrchestration(response, { measuredLatencyMs: this.now() - context.startedAt }) };
        }
        default:
          return assertNever(plan);
      }
    } catch (error: unknown) {
      if (error instanceof LabServiceError) {
        return { result: this.failureResult(plan.kind, error, context), failure: error };
      }
      throw error;
    }
  }

  private failureResult(kind: ExecutionType, error: LabServiceError, context: ExecutionContext): ExecutionResult {
    return {
      status: 'failure',
      output: `${FAILURE_PREFIX[error.kind]}. ${error.message}`,
      metrics: { latency_ms: this.now() - context.startedAt },
      ...(kind === 'orchestrator' ? { flow: [] } : {}),
    };
  }

  private publish(event: ExecutionEvent): void {
    try {
      this.eventSink.publish(event);
    } catch (error: unknown) {
      this.logger.warn({ requestId: event.requestId, err: error }, 'Execution event sink failed');
    }
  }
}

function assertNever(plan: never): never {
  throw new InternalRoutingError(plan);
}
