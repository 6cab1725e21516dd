import type { LabClient, ProbeTarget } from '../clients/lab-client.js';
import { validateGatewayConfig, type GatewayConfig } from '../config/environment.js';
import type {
  ComponentCheckResult,
  ComponentStatus,
  HealthReport,
  LivenessReport,
  ReadinessReport,
} from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export interface ComponentCheckOutcome {
  status: ComponentStatus;
  message?: string;
}

export interface HealthCheck {
  name: string;
  /** A critical check that is not ok makes the whole service unavailable */
  critical: boolean;
  run(): Promise<ComponentCheckOutcome>;
}

export interface HealthMonitorOptions {
  serviceName: string;
  serviceVersion: string;
  checkTimeoutMs: number;
  logger?: Logger;
  now?: () => number;
}

export class HealthMonitor {
  private readonly checks: HealthCheck[] = [];
  private readonly options: HealthMonitorOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly startTime: number;

  constructor(options: HealthMonitorOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger).child({ component: 'health-monitor' });
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  register(check: HealthCheck): this {
    if (this.checks.some((existing) => existing.name === check.name)) {
      throw new Error(`Health check already registered: ${check.name}`);
    }
    this.checks.push(check);
    return this;
  }

  /**
   * Liveness: the process is up and answering. Never looks at dependencies.
   */
  basic(): LivenessReport {
    return {
      status: 'ok',
      service: this.options.serviceName,
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  /**
   * Run every registered check concurrently, each bounded by the check timeout.
   */
  async detailed(): Promise<HealthReport> {
    const results = await Promise.all(
      this.checks.map(async (check) => ({ check, result: await this.runCheck(check) }))
    );

    const components: Record<string, ComponentStatus> = {};
    const checks: Record<string, ComponentCheckResult> = {};
    for (const { check, result } of results) {
      components[check.name] = result.status;
      checks[check.name] = result;
    }

    return {
      status: determineHealthStatus(results),
      service: this.options.serviceName,
      version: this.options.serviceVersion,
      timestamp: new Date(this.now()).toISOString(),
      uptime_seconds: Math.floor((this.now() - this.startTime) / 1000),
      components,
      checks,
    };
  }

  /**
   * Readiness: accept traffic while degraded and let each request fail soft.
   */
  async ready(): Promise<ReadinessReport> {
    const report = await this.detailed();
    return {
      status: report.status,
      ready: report.status !== 'unavailable',
      timestamp: report.timestamp,
      components: report.components,
    };
  }

  private async runCheck(check: HealthCheck): Promise<ComponentCheckResult> {
    const started = this.now();

    try {
      const outcome = await withTimeout(check.run(), this.options.checkTimeoutMs, `Health check ${check.name}`);
      return {
        status: outcome.status,
        latency_ms: this.now() - started,
        ...(outcome.message ? { message: outcome.message } : {}),
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ check: check.name, err: error }, 'Health check did not complete');
      return { status: 'unavailable', latency_ms: this.now() - started, message };
    }
  }
}

function determineHealthStatus(results: Array<{ check: HealthCheck; result: ComponentCheckResult }>): ComponentStatus {
  if (results.some(({ check, result }) => check.critical && result.status !== 'ok')) {
    return 'unavailable';
  }
  return results.every(({ result }) => result.status === 'ok') ? 'ok' : 'degraded';
}

/* ---------- Built-in checks ---------- */

export function configurationCheck(config: GatewayConfig): HealthCheck {
  return {
    name: 'configuration',
    critical: true,
    run: async () => {
      const problems = validateGatewayConfig(config);
      return problems.length === 0 ? { status: 'ok' } : { status: 'unavailable', message: problems.join('; ') };
    },
  };
}

/** Reachability of one Lab Service endpoint; never runs a model */
export function labProbeCheck(name: string, client: LabClient, target: ProbeTarget): HealthCheck {
  return {
    name,
    critical: false,
    run: async () => {
      const probe = await client.probe(target);
      return probe.reachable
        ? { status: 'ok' }
        : { status: 'unavailable', message: probe.error ?? 'Lab Service endpoint unreachable' };
    },
  };
}

export function createHealthMonitor(config: GatewayConfig, client: LabClient, logger?: Logger): HealthMonitor {
  return new HealthMonitor({
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    checkTimeoutMs: config.healthCheckTimeoutMs,
    logger,
  })
    .register(configurationCheck(config))
    .register(labProbeCheck('lab_inference', client, 'inference'))
    .register(labProbeCheck('lab_orchestrator', client, 'orchestrate'));
}
