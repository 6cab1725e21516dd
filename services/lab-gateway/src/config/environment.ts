import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';

export interface GatewayConfig {
  readonly port: number;
  readonly urlPrefix: string;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly labServiceUrl: string;
  /** Bound on every inference/orchestration call */
  readonly requestTimeoutMs: number;
  readonly retryOnConnectError: boolean;
  readonly retryDelayMs: number;
  /** Bound on each health check, probes included */
  readonly healthCheckTimeoutMs: number;
  readonly allowedModels: readonly string[];
  readonly defaultModel: string;
  readonly shutdownTimeoutMs: number;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().default(8000),
  URL_PREFIX: z.string().default('/api/v1'),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().optional(),
  SERVICE_NAME: z.string().default('lab-gateway'),
  SERVICE_VERSION: z.string().default('0.1.0'),
  LAB_SERVICE_URL: z.string().default('http://127.0.0.1:8001'),
  LAB_REQUEST_TIMEOUT_MS: z.coerce.number().int().default(300000),
  LAB_RETRY_ON_CONNECT_ERROR: booleanFlag.default('true'),
  LAB_RETRY_DELAY_MS: z.coerce.number().int().default(250),
  HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().int().default(5000),
  ALLOWED_MODELS: z.string().default('mistral7b,llama3,phi3'),
  DEFAULT_MODEL: z.string().default('mistral7b'),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().default(10000),
});

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build the gateway configuration from environment variables.
 * Called once at process start; the result is frozen and passed to every
 * component that needs it.
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigurationError(`Invalid environment configuration: ${fields}`, parsed.error.issues);
  }

  const vars = parsed.data;
  return Object.freeze({
    port: vars.PORT,
    urlPrefix: vars.URL_PREFIX.replace(/\/+$/, ''),
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'test' ? 'silent' : 'info'),
    serviceName: vars.SERVICE_NAME,
    serviceVersion: vars.SERVICE_VERSION,
    labServiceUrl: vars.LAB_SERVICE_URL.replace(/\/+$/, ''),
    requestTimeoutMs: vars.LAB_REQUEST_TIMEOUT_MS,
    retryOnConnectError: vars.LAB_RETRY_ON_CONNECT_ERROR,
    retryDelayMs: vars.LAB_RETRY_DELAY_MS,
    healthCheckTimeoutMs: vars.HEALTH_CHECK_TIMEOUT_MS,
    allowedModels: Object.freeze(splitList(vars.ALLOWED_MODELS)),
    defaultModel: vars.DEFAULT_MODEL.trim(),
    shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
  });
}

/**
 * Semantic checks on an already-parsed configuration.
 * Returns the list of problems; an empty list means the service can serve traffic.
 */
export function validateGatewayConfig(config: GatewayConfig): string[] {
  const problems: string[] = [];

  let labUrl: URL | null = null;
  try {
    labUrl = new URL(config.labServiceUrl);
  } catch {
    problems.push(`LAB_SERVICE_URL is not a valid URL: ${config.labServiceUrl}`);
  }
  if (labUrl && labUrl.protocol !== 'http:' && labUrl.protocol !== 'https:') {
    problems.push(`LAB_SERVICE_URL must use http or https, got ${labUrl.protocol}`);
  }

  if (config.requestTimeoutMs <= 0) {
    problems.push('LAB_REQUEST_TIMEOUT_MS must be positive');
  }
  if (config.healthCheckTimeoutMs <= 0) {
    problems.push('HEALTH_CHECK_TIMEOUT_MS must be positive');
  }
  if (config.retryDelayMs < 0) {
    problems.push('LAB_RETRY_DELAY_MS must not be negative');
  }
  if (config.allowedModels.length === 0) {
    problems.push('ALLOWED_MODELS must list at least one model');
  } else if (!config.allowedModels.includes(config.defaultModel)) {
    problems.push(`DEFAULT_MODEL "${config.defaultModel}" is not in ALLOWED_MODELS`);
  }
  if (!config.urlPrefix.startsWith('/')) {
    problems.push('URL_PREFIX must start with "/"');
  }

  return problems;
}
