import { z, type ZodIssue } from 'zod';
import type { GatewayConfig } from '../../config/environment.js';
import { ClientInputError, type ClientInputReason } from '../../types/errors.js';
import { EXECUTION_TYPES, type ExecutionRequest } from '../../types/index.js';

const ExecutionRequestSchema = z.object({
  prompt: z.string().refine((value) => value.trim().length > 0, 'prompt must not be empty'),
  model: z.string().min(1).nullish(),
  execution_type: z.enum(EXECUTION_TYPES),
  agents: z.array(z.string()).nullish(),
  tools: z.array(z.string()).nullish(),
  strategy: z.string().nullish(),
  temperature: z.number().min(0).max(1).nullish(),
  max_tokens: z.number().int().min(16).max(4096).nullish(),
  verbose: z.boolean().nullish(),
  enable_history: z.boolean().nullish(),
  retry_on_error: z.boolean().nullish(),
});

export type ModelPolicy = Pick<GatewayConfig, 'allowedModels' | 'defaultModel'>;

/**
 * Validate an inbound /execute body.
 * Throws ClientInputError before anything reaches the router.
 */
export function parseExecutionRequest(body: unknown, policy: ModelPolicy): ExecutionRequest {
  const parsed = ExecutionRequestSchema.safeParse(body);
  if (!parsed.success) {
    const reason = reasonFor(parsed.error.issues);
    throw new ClientInputError(reason, describeIssues(parsed.error.issues), parsed.error.issues);
  }

  const data = parsed.data;
  const model = data.model ?? policy.defaultModel;
  if (!policy.allowedModels.includes(model)) {
    throw new ClientInputError(
      'model_not_allowed',
      `model "${model}" is not allowed; expected one of: ${policy.allowedModels.join(', ')}`
    );
  }

  return {
    prompt: data.prompt,
    model,
    execution_type: data.execution_type,
    agents: data.agents ?? undefined,
    tools: data.tools ?? undefined,
    strategy: data.strategy ?? undefined,
    temperature: data.temperature ?? undefined,
    max_tokens: data.max_tokens ?? undefined,
    verbose: data.verbose ?? undefined,
    enable_history: data.enable_history ?? undefined,
    retry_on_error: data.retry_on_error ?? undefined,
  };
}

function isMissing(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined';
}

function reasonFor(issues: ZodIssue[]): ClientInputReason {
  const executionTypeIssue = issues.find((issue) => issue.path[0] === 'execution_type');
  if (executionTypeIssue && !isMissing(executionTypeIssue)) {
    return 'unsupported_execution_type';
  }
  return issues.some(isMissing) ? 'missing_field' : 'invalid_field';
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.join('.') || 'body';
      return isMissing(issue) ? `${field} is required` : `${field}: ${issue.message}`;
    })
    .join('; ');
}
