import { Server } from 'http';
import { createApp } from './app';
import { AppConfig, getConfigSummary } from './core/config';
import { logger } from './core/logger';
import { createServices, ServiceOverrides, Services } from './services/container';

let server: Server | null = null;
let isShuttingDown = false;

/**
 * Load the ledger, then start listening
 */
export async function startServer(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Server> {
  if (server) {
    throw new Error('Server is already started');
  }

  logger.level = config.LOG_LEVEL;
  const services: Services = createServices(config, overrides);
  await services.store.init();

  const app = createApp(services);

  return new Promise((resolve, reject) => {
    const listening = app.listen(config.PORT, () => {
      server = listening;
      logger.info({ config: getConfigSummary(config) }, `Server running on port ${config.PORT}`);
      resolve(listening);
    });

    listening.on('error', (error) => {
      logger.error({ error }, 'Server error');
      reject(error);
    });
  });
}

/**
 * Stop accepting connections and wait for in-flight requests
 */
export async function stopServer(): Promise<void> {
  const current = server;
  if (!current || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    await new Promise<void>((resolve, reject) => {
      current.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Graceful shutdown completed');
  } finally {
    server = null;
    isShuttingDown = false;
  }
}

/**
 * Check if server is currently running
 */
export function isServerRunning(): boolean {
  return server !== null && !isShuttingDown;
}
