import type { ExecutionStatus, ExecutionType } from '../types/index.js';

export interface ExecutionCompletedEvent {
  type: 'execution.completed';
  requestId: string;
  executionType: ExecutionType;
  status: ExecutionStatus;
  latencyMs: number;
  timestamp: string;
}

export type ExecutionEvent = ExecutionCompletedEvent;

/**
 * Outbound capability for a future pub/sub or WebSocket fan-out.
 * The router publishes to it and never depends on what happens next.
 */
export interface ExecutionEventSink {
  publish(event: ExecutionEvent): void;
}

export const noopEventSink: ExecutionEventSink = {
  publish: () => undefined,
};
