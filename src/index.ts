import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, connectRedis, disconnectRedis, pool } from './connections';
import { logger, errorMeta } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Initializing connections...');

    // Connect to database
    logger.info('Connecting to database...');
    await connectDatabase();

    // Connect to Redis
    logger.info('Connecting to Redis...');
    await connectRedis();

    // Start server
    const server = app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
      logger.info('All services are ready!');
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down...`);
      server.close(() => {
        Promise.all([pool.end(), disconnectRedis()])
          .then(() => logger.info('Connections closed'))
          .catch((error: unknown) => logger.error('Error while closing connections', errorMeta(error)))
          .finally(() => process.exit(0));
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', errorMeta(error));
    logger.error('Exiting application...');
    process.exit(1);
  }
};

// Start the application
void startServer();
