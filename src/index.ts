import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */
function startServer(): void {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    logger.info('Bouquet Allocation API listening', {
      environment: env.NODE_ENV,
      port: env.PORT,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

try {
  startServer();
} catch (error) {
  logger.error('Failed to start server', { error });
  process.exit(1);
}
