import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, connectRedis, disconnectRedis, pool } from './connections';
import { errorMeta, logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Initializing connections...');

    logger.info('Connecting to database...');
    await connectDatabase();

    // The product cache is optional, reads fall back to the database
    logger.info('Connecting to Redis...');
    try {
      await connectRedis();
    } catch (error) {
      logger.warn('Redis unavailable, product cache disabled', errorMeta(error));
    }

    const server = app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down...`);
      server.close(() => {
        Promise.all([pool.end(), disconnectRedis()])
          .then(() => process.exit(0))
          .catch(error => {
            logger.error('Error during shutdown:', errorMeta(error));
            process.exit(1);
          });
      });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', errorMeta(error));
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
