/**
 * Assessment API entry point.
 */

import { config, createPipeline, logger } from '@riskline/shared';
import { createApp } from './app';

const pipeline = createPipeline(config);
const app = createApp(pipeline);

const server = app.listen(config.port, () => {
  logger.info('Assessment API started', { port: config.port });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((err) => {
    if (err) {
      logger.error('Error while closing HTTP server', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
