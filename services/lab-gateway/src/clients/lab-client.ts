/**
 * Lab Service Client
 * Outbound calls to the Lab Service inference and orchestration endpoints,
 * with timeout, a single connect-level retry, and error translation.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import type { GatewayConfig } from '../config/environment.js';
import {
  LabMalformedResponseError,
  LabServiceError,
  LabUnreachableError,
  LabUpstreamError,
} from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/timeout.js';
import {
  InferenceResponseSchema,
  OrchestrationResponseSchema,
  UpstreamModelListSchema,
  type InferencePayload,
  type InferenceResponse,
  type OrchestrationPayload,
  type OrchestrationResponse,
  type UpstreamModel,
} from './lab-schemas.js';

/* ---------- Public Types ---------- */
export type ProbeTarget = 'inference' | 'orchestrate';

export interface ProbeResult {
  target: ProbeTarget;
  reachable: boolean;
  latencyMs: number;
  statusCode?: number;
  error?: string;
}

export interface CallOptions {
  requestId?: string;
}

/** What the router and the health monitor need from the Lab Service */
export interface LabClient {
  callInference(payload: InferencePayload, options?: CallOptions): Promise<InferenceResponse>;
  callOrchestrate(payload: OrchestrationPayload, options?: CallOptions): Promise<OrchestrationResponse>;
  probe(target: ProbeTarget): Promise<ProbeResult>;
  listModels(options?: CallOptions): Promise<UpstreamModel[]>;
}

export type LabClientConfig = Pick<
  GatewayConfig,
  | 'labServiceUrl'
  | 'requestTimeoutMs'
  | 'healthCheckTimeoutMs'
  | 'retryOnConnectError'
  | 'retryDelayMs'
  | 'serviceName'
  | 'serviceVersion'
>;

export const LAB_ENDPOINTS = {
  inference: '/inference/',
  orchestrate: '/orchestrate/',
  models: '/models',
} as const;

// Errors where the request never left this host, so resending cannot duplicate work
const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH']);
const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/* ---------- Client Class ---------- */
export class HttpLabClient implements LabClient {
  private readonly client: AxiosInstance;
  private readonly config: LabClientConfig;
  private readonly logger: Logger;

  constructor(config: LabClientConfig, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger.child({ component: 'lab-client' });

    this.client = axios.create({
      baseURL: config.labServiceUrl,
      timeout: config.requestTimeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `${config.serviceName}/${config.serviceVersion}`,
      },
    });

    // Interceptor for structured error logging
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          this.logger.warn(
            {
              url: error.config?.url,
              code: error.code,
              status: error.response?.status,
            },
            'Lab Service request failed'
          );
        }
        return Promise.reject(error);
      }
    );
  }

  async callInference(payload: InferencePayload, options: CallOptions = {}): Promise<InferenceResponse> {
    return this.post(LAB_ENDPOINTS.inference, payload, InferenceResponseSchema, options);
  }

  async callOrchestrate(payload: OrchestrationPayload, options: CallOptions = {}): Promise<OrchestrationResponse> {
    return this.post(LAB_ENDPOINTS.orchestrate, payload, OrchestrationResponseSchema, options);
  }

  async listModels(options: CallOptions = {}): Promise<UpstreamModel[]> {
    const endpoint = LAB_ENDPOINTS.models;
    const data = await this.send(endpoint, {
      method: 'GET',
      url: endpoint,
      timeout: this.config.healthCheckTimeoutMs,
      headers: requestHeaders(options),
    });
    return parseBody(endpoint, data, UpstreamModelListSchema);
  }

  /**
   * Lightweight reachability check. A 2xx answer, or 405 for a GET on a
   * POST-only route, means the endpoint is there. A 404 means the URL is wrong.
   */
  async probe(target: ProbeTarget): Promise<ProbeResult> {
    const url = LAB_ENDPOINTS[target];
    const started = performance.now();

    try {
      const response = await this.client.get(url, {
        timeout: this.config.healthCheckTimeoutMs,
        validateStatus: () => true,
      });
      const latencyMs = Math.round(performance.now() - started);
      const reachable = (response.status >= 200 && response.status < 300) || response.status === 405;
      return {
        target,
        reachable,
        latencyMs,
        statusCode: response.status,
        ...(reachable ? {} : { error: `HTTP ${response.status}` }),
      };
    } catch (error: unknown) {
      return {
        target,
        reachable: false,
        latencyMs: Math.round(performance.now() - started),
        error: describeTransportError(error),
      };
    }
  }

  /* ---------- Internal request helpers ---------- */
  private async post<Output>(
    endpoint: string,
    payload: object,
    schema: ZodType<Output, ZodTypeDef, unknown>,
    options: CallOptions
  ): Promise<Output> {
    const data = await this.send(endpoint, {
      method: 'POST',
      url: endpoint,
      data: payload,
      headers: requestHeaders(options),
    });
    return parseBody(endpoint, data, schema);
  }

  private async send(endpoint: string, request: AxiosRequestConfig): Promise<unknown> {
    const maxAttempts = this.config.retryOnConnectError ? 2 : 1;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.client.request<unknown>(request);
        return response.data;
      } catch (error: unknown) {
        const translated = translateError(endpoint, error, attempt);
        if (translated instanceof LabUnreachableError && isConnectError(error) && attempt < maxAttempts) {
          this.logger.info(
            { endpoint, attempt, code: axios.isAxiosError(error) ? error.code : undefined },
            'Retrying Lab Service call after connection failure'
          );
          await sleep(this.config.retryDelayMs);
          continue;
        }
        throw translated;
      }
    }
  }
}

function requestHeaders(options: CallOptions): Record<string, string> {
  return options.requestId ? { 'X-Request-Id': options.requestId } : {};
}

function parseBody<Output>(endpoint: string, data: unknown, schema: ZodType<Output, ZodTypeDef, unknown>): Output {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new LabMalformedResponseError(endpoint, parsed.error.issues);
  }
  return parsed.data;
}

function isConnectError(error: unknown): boolean {
  return axios.isAxiosError(error) && !error.response && CONNECT_ERROR_CODES.has(error.code ?? '');
}

function translateError(endpoint: string, error: unknown, attempts: number): LabServiceError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new LabUpstreamError(endpoint, error.response.status, error.response.data);
    }
    const timedOut = TIMEOUT_ERROR_CODES.has(error.code ?? '');
    return new LabUnreachableError(endpoint, error.code ?? error.message, timedOut, attempts);
  }
  return new LabUnreachableError(endpoint, describeTransportError(error), false, attempts);
}

function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/* ---------- Factory Function ---------- */
export function createLabClient(config: LabClientConfig, logger?: Logger): LabClient {
  return new HttpLabClient(config, logger);
}
