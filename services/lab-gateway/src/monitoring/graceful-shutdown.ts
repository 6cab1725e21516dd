import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export type CleanupTask = () => Promise<void>;

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  logger: Logger;
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly cleanupTasks: Array<{ name: string; task: CleanupTask }> = [];
  private readonly options: ShutdownOptions;
  private readonly logger: Logger;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 10000,
      forceExit: true,
      logger: silentLogger,
      exit: (code) => process.exit(code),
      ...options,
    };
    this.logger = this.options.logger.child({ component: 'graceful-shutdown' });
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  install(): this {
    // Handle SIGTERM (Docker, Kubernetes)
    process.once('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    // Handle SIGINT (Ctrl+C)
    process.once('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ err: reason }, 'Unhandled promise rejection');
      void this.shutdown('unhandledRejection', reason);
    });

    process.on('uncaughtException', (error) => {
      this.logger.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException', error);
    });

    return this;
  }

  /**
   * Add a cleanup task; tasks run in registration order
   */
  addCleanupTask(name: string, task: CleanupTask): void {
    this.cleanupTasks.push({ name, task });
  }

  /**
   * Run cleanup tasks and exit. A second call while in progress is ignored.
   */
  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.info({ signal }, 'Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info({ signal }, 'Initiating graceful shutdown');

    // Set timeout for forced shutdown
    this.shutdownTimeout = setTimeout(() => {
      this.logger.error({ timeoutMs: this.options.timeout }, 'Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    const failures = await this.executeCleanupTasks();

    clearTimeout(this.shutdownTimeout);
    this.shutdownTimeout = null;

    this.logger.info({ failures }, 'Graceful shutdown completed');
    this.options.exit(error !== undefined || failures > 0 ? 1 : 0);
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private async executeCleanupTasks(): Promise<number> {
    let failures = 0;

    for (const { name, task } of this.cleanupTasks) {
      try {
        await task();
        this.logger.debug({ task: name }, 'Cleanup task completed');
      } catch (taskError: unknown) {
        failures++;
        // Continue with other tasks even if one fails
        this.logger.error({ task: name, err: taskError }, 'Cleanup task failed');
      }
    }

    return failures;
  }
}
