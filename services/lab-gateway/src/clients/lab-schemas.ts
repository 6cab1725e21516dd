/**
 * Wire schemas of the Lab Service.
 * A body that fails these is a malformed response; the normalizer only
 * ever sees data that passed them.
 */

import { z } from 'zod';

// Values are not restricted here; the normalizer keeps only the numeric ones
const MetricsSchema = z.record(z.string(), z.unknown());

export const InferenceResponseSchema = z.object({
  text: z.string(),
  metrics: MetricsSchema.optional(),
  success: z.boolean().optional(),
  error: z.string().nullable().optional(),
  model: z.string().optional(),
});
export type InferenceResponse = z.infer<typeof InferenceResponseSchema>;

// The Lab reported completed/error before it settled on done/failed
const UpstreamNodeStatusSchema = z
  .enum(['pending', 'running', 'done', 'failed', 'completed', 'error'])
  .transform((status) => (status === 'completed' ? 'done' : status === 'error' ? 'failed' : status));

const UpstreamNodeSchema = z.object({
  name: z.string().min(1),
  status: UpstreamNodeStatusSchema,
  output: z.string().nullable().optional(),
  position: z.number().int().optional(),
});
export type UpstreamNode = z.infer<typeof UpstreamNodeSchema>;

export const OrchestrationResponseSchema = z.object({
  nodes: z.array(UpstreamNodeSchema),
  output: z.string().nullable().optional(),
  metrics: MetricsSchema.optional(),
  error: z.string().nullable().optional(),
});
export type OrchestrationResponse = z.infer<typeof OrchestrationResponseSchema>;

const UpstreamModelSchema = z.object({
  key: z.string(),
  name: z.string(),
});
export const UpstreamModelListSchema = z.array(UpstreamModelSchema);
export type UpstreamModel = z.infer<typeof UpstreamModelSchema>;

/* ---------- Outbound payloads ---------- */

export interface InferencePayload {
  prompt: string;
  model: string;
  strategy?: string;
  temperature?: number;
  max_tokens?: number;
}

export interface OrchestrationPayload {
  prompt: string;
  model: string;
  agents: string[];
  tools: string[];
  verbose?: boolean;
  enable_history?: boolean;
  retry_on_error?: boolean;
}
