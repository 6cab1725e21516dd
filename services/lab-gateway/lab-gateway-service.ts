import dotenv from 'dotenv';
import { createGateway } from './src/app.js';
import { loadGatewayConfig, validateGatewayConfig } from './src/config/environment.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createLogger } from './src/utils/logger.js';

dotenv.config();

const config = loadGatewayConfig();
const logger = createLogger(config);

const gateway = createGateway(config, { logger });
const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs, logger }).install();

// Initialize the service
async function startService(): Promise<void> {
  logger.info(
    {
      environment: config.nodeEnv,
      port: config.port,
      urlPrefix: config.urlPrefix,
      labServiceUrl: config.labServiceUrl,
      allowedModels: config.allowedModels,
    },
    'Starting Lab Gateway'
  );

  // Semantic problems do not stop the process; readiness reports them instead
  const problems = validateGatewayConfig(config);
  for (const problem of problems) {
    logger.error({ problem }, 'Invalid configuration');
  }

  const server = gateway.app.listen(config.port, () => {
    logger.info(`Lab Gateway listening on http://localhost:${config.port}${config.urlPrefix}`);
  });

  gracefulShutdown.addCleanupTask(
    'http-server',
    () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  );

  const initialHealth = await gateway.healthMonitor.detailed();
  logger.info({ status: initialHealth.status, components: initialHealth.components }, 'Initial health status');
}

startService().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start service');
  process.exit(1);
});

export { gateway };
