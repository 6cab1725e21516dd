/**
 * Maps the two Lab Service response shapes onto the single client-facing
 * ExecutionResult. Pure functions: no I/O, no clock reads.
 */

import type { InferenceResponse, OrchestrationResponse, UpstreamNode } from '../clients/lab-schemas.js';
import type { ExecutionMetrics, ExecutionResult, ExecutionStatus, NodeState } from '../types/index.js';

export interface NormalizeContext {
  /** Latency measured by the router, used when the Lab does not report one */
  measuredLatencyMs: number;
}

export const NO_USABLE_OUTPUT_MESSAGE = 'Orchestration finished without usable output';

export function normalizeInference(response: InferenceResponse, context: NormalizeContext): ExecutionResult {
  const metrics = buildMetrics(response.metrics, context);
  const upstreamError = nonEmpty(response.error);

  if (response.success === false || upstreamError !== null) {
    return {
      status: 'failure',
      output: upstreamError ?? 'Lab Service reported an unsuccessful inference',
      metrics,
    };
  }

  return {
    status: 'success',
    output: response.text,
    metrics,
  };
}

export function normalizeOrchestration(response: OrchestrationResponse, context: NormalizeContext): ExecutionResult {
  const flow = response.nodes.map(toNodeState);
  const status = orchestrationStatus(flow);

  const counters = {
    node_count: flow.length,
    nodes_done: flow.filter(isDone).length,
    nodes_failed: flow.filter((node) => node.status === 'failed').length,
  };

  return {
    status,
    output: orchestrationOutput(response, flow),
    metrics: { ...buildMetrics(response.metrics, context), ...counters },
    flow,
  };
}

/**
 * success: at least one node and every node done.
 * partial: otherwise, when at least one node finished.
 * failure: no node finished.
 */
export function orchestrationStatus(flow: readonly NodeState[]): ExecutionStatus {
  if (flow.length > 0 && flow.every(isDone)) {
    return 'success';
  }
  return flow.some(isDone) ? 'partial' : 'failure';
}

function toNodeState(node: UpstreamNode, index: number): NodeState {
  return {
    name: node.name,
    status: node.status,
    output: node.output ?? '',
    position: node.position ?? index,
  };
}

function isDone(node: NodeState): boolean {
  return node.status === 'done';
}

function hasUsableOutput(node: NodeState): boolean {
  return isDone(node) && node.output.trim().length > 0;
}

function orchestrationOutput(response: OrchestrationResponse, flow: readonly NodeState[]): string {
  const upstreamOutput = nonEmpty(response.output);
  if (upstreamOutput !== null) {
    return upstreamOutput;
  }

  const lastUsable = [...flow].reverse().find(hasUsableOutput);
  if (lastUsable) {
    return lastUsable.output;
  }

  return nonEmpty(response.error) ?? NO_USABLE_OUTPUT_MESSAGE;
}

// Non-numeric entries such as models_used or a null counter are dropped
function buildMetrics(upstream: Record<string, unknown> | undefined, context: NormalizeContext): ExecutionMetrics {
  const numeric: Record<string, number> = {};
  for (const [key, value] of Object.entries(upstream ?? {})) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      numeric[key] = value;
    }
  }
  return {
    ...numeric,
    latency_ms: numeric['latency_ms'] ?? context.measuredLatencyMs,
  };
}

function nonEmpty(value: string | null | undefined): string | null {
  return value !== undefined && value !== null && value.trim().length > 0 ? value : null;
}
