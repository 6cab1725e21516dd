// Execution Types
export const EXECUTION_TYPES = ['simple', 'orchestrator'] as const;
export type ExecutionType = (typeof EXECUTION_TYPES)[number];

export interface ExecutionRequest {
  prompt: string;
  model: string;
  execution_type: ExecutionType;
  agents?: string[];
  tools?: string[];
  strategy?: string;
  temperature?: number;
  max_tokens?: number;
  verbose?: boolean;
  enable_history?: boolean;
  retry_on_error?: boolean;
}

export type ExecutionStatus = 'success' | 'partial' | 'failure';

export type NodeStatus = 'pending' | 'running' | 'done' | 'failed';

export interface NodeState {
  readonly name: string;
  readonly status: NodeStatus;
  readonly output: string;
  readonly position: number;
}

/** Always carries latency_ms; other counters depend on the execution type */
export type ExecutionMetrics = Readonly<Record<string, number>> & { readonly latency_ms: number };

export interface ExecutionResult {
  status: ExecutionStatus;
  output: string;
  metrics: ExecutionMetrics;
  flow?: NodeState[];
}

// Per-request data threaded from the HTTP layer down to the Lab client
export interface ExecutionContext {
  requestId: string;
  startedAt: number;
}

// Health Types
export type ComponentStatus = 'ok' | 'degraded' | 'unavailable';

export interface ComponentCheckResult {
  status: ComponentStatus;
  latency_ms: number;
  message?: string;
}

export interface HealthReport {
  status: ComponentStatus;
  service: string;
  version: string;
  timestamp: string;
  uptime_seconds: number;
  components: Record<string, ComponentStatus>;
  checks: Record<string, ComponentCheckResult>;
}

export interface LivenessReport {
  status: 'ok';
  service: string;
  timestamp: string;
}

export interface ReadinessReport {
  status: ComponentStatus;
  ready: boolean;
  timestamp: string;
  components: Record<string, ComponentStatus>;
}
