import { pino, type Logger } from 'pino';
import type { GatewayConfig } from '../config/environment.js';

export type { Logger };

/**
 * Root structured logger. Components take a child bound to their name.
 */
export function createLogger(config: Pick<GatewayConfig, 'logLevel' | 'nodeEnv' | 'serviceName'>): Logger {
  return pino({
    name: config.serviceName,
    level: config.logLevel,
    transport:
      config.nodeEnv === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}

/** Logger that drops everything; used when a component is built without one */
export const silentLogger: Logger = pino({ level: 'silent' });
