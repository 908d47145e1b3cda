import { createApp } from './app';
import { adminConfig, appConfig, createAppContext } from './connections';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Build in-memory state and start server
 */
const startServer = () => {
  try {
    logger.info('Initializing in-memory stores...');
    const context = createAppContext(appConfig, adminConfig);

    const app = createApp(context);
    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
      logger.info(`Serving images from ${appConfig.uploadDir}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

startServer();
