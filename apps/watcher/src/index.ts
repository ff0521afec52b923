/**
 * dockwatch entry point
 *
 * Mirrors running Docker containers into the dashboard services file and
 * asks the dashboard to reload whenever the file changes.
 */

import { ConfigurationError, errorMessage } from '@dockwatch/core';
import { loadWatcherConfig, type WatcherConfig } from './config/env';
import type { EventLoopDriver } from './event-loop';
import { initializeLogger } from './logger';
import { createWatcher } from './watcher';

function readConfig(): WatcherConfig | null {
  try {
    return loadWatcherConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.toString());
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) {
    return 1;
  }

  const logger = initializeLogger(config.logging, config.nodeEnv);
  logger.info('Starting dockwatch', {
    servicesFile: config.servicesFile,
    reloadUrl: config.reload.url,
    socket: config.docker.socketPath,
  });

  let driver: EventLoopDriver;
  try {
    ({ driver } = createWatcher(config, logger));
  } catch (error) {
    logger.error('Failed to start watcher', { error: errorMessage(error) });
    return 1;
  }

  const shutdown = (signal: string): void => {
    logger.info('Received shutdown signal', { signal });
    driver.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    const exit = await driver.start();
    if (exit === 'closed') {
      logger.error('Runtime event stream closed unexpectedly');
      return 1;
    }
    return 0;
  } catch (error) {
    logger.error('Event subscription failed', { error: errorMessage(error) });
    return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
