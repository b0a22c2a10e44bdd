import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, connectRedis } from './connections';
import { logger, errorMessage } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Initializing connections...');

    logger.info('Connecting to database...');
    await connectDatabase();

    logger.info('Connecting to Redis...');
    await connectRedis();

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
      logger.info('All services are ready!');
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
