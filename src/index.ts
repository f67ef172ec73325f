import app from './app';
import { config } from './config/config';
import { logger } from './utils/logger';

const PORT = config.port || 3000;

const server = app.listen(PORT, () => {
  logger.info('Offer Invoice Reconciler API started');
  logger.info(`Server running on port ${PORT}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info('Engine defaults', {
    priceTolerance: config.engine.priceTolerance,
    extractionMethod: config.engine.extractionMethod
  });
});

// Graceful shutdown
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);

  server.close(error => {
    if (error) {
      logger.error('Error during graceful shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

export default server;
