import { loadConfig, validateConfig } from './core/config';
import { logger } from './core/logger';
import { startServer, stopServer } from './server-control';

const config = loadConfig();
const issues = validateConfig(config);
if (issues.length > 0) {
  logger.fatal({ issues }, 'Invalid configuration');
  process.exit(1);
}

// Start the server
startServer(config).catch((error: unknown) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

// Graceful shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection');
});
