import { env } from './config/env.js';
import { logger } from './config/logger.js';
import { createApp } from './app.js';
import { disconnect } from './db/client.js';

/**
 * Web server entry point
 */

async function startServer() {
  logger.info('Starting chapter slip analytics server');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const app = createApp();

  const server = app.listen(env.PORT, () => {
    logger.info(`Server listening on port ${env.PORT}`);
    logger.info(`Health check: http://localhost:${env.PORT}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      disconnect()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Error closing database pool', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
