import { createApp } from './app';
import { env } from './config';
import { healthService } from './services';
import { logger, Logging } from './utils';

/**
 * Start the server
 */
const startServer = (): void => {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    Logging.box('CREDITS RECONCILER', `Server started in ${env.NODE_ENV} mode`);
    Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
    Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
    Logging.info(
      `Default match threshold ${env.MATCH_THRESHOLD}, minimum substring length ${env.MIN_SUBSTRING_LENGTH}`
    );
  });

  // Graceful shutdown handlers
  const gracefulShutdown = (signal: string): void => {
    logger.info(`${signal} received. Starting graceful shutdown...`);
    healthService.markShuttingDown();

    server.close((err) => {
      if (err) {
        logger.error('Error during server shutdown:', err);
        process.exit(1);
      }

      logger.info('Server closed successfully');
      process.exit(0);
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (err: Error) => {
    logger.error('Uncaught Exception:', err);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection:', reason);
    process.exit(1);
  });
};

startServer();
