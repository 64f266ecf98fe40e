#!/usr/bin/env node

/**
 * Main server file for the resource range service
 *
 * Usage:
 *   npm run build && npm start
 *
 * Then request a range of resources:
 *   curl -H 'Range: resources=0-9' http://localhost:3000/resources
 */

import path from 'path';
import config from '../../config';
import { createApp } from './app';
import type { ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { InMemoryResourceRepository } from '../../infrastructure/repository/InMemoryResourceRepository';

function createLogger(): CompositeLogger {
  const loggers: ILogger[] = [new ConsoleLogger(config.LOG_LEVEL)];
  if (config.LOG_TO_FILE) {
    loggers.push(new FileLogger(path.join(config.RUNTIME_DIR, 'logs'), config.LOG_LEVEL));
  }
  return new CompositeLogger(...loggers);
}

const logger = createLogger();

(async () => {
  const resourceRepository = new InMemoryResourceRepository(logger);
  if (config.SEED_RESOURCE_COUNT > 0) {
    await resourceRepository.seed(config.SEED_RESOURCE_COUNT);
  }

  const app = createApp({ config, logger, resourceRepository });

  const server = app.listen(config.PORT, () => {
    logger.info(`Resource range service running on http://localhost:${config.PORT}`);
    logger.info(`Range unit: ${config.RANGE_UNITS}, max range length: ${config.MAX_RANGE_LENGTH}`);
  });

  // Process termination handling
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, stopping server...`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server:', error);
      }
      logger.close();
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
})().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
