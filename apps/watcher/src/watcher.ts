/**
 * Wiring: builds the runtime adapter, store, notifier, cycle and driver
 * from a validated configuration.
 */

import type { Logger } from '@dockwatch/core';
import {
  DEFAULT_CATEGORY_MAP,
  DockerRuntimeClient,
  createDockerClient,
  extendCategoryMap,
  type DockerApi,
} from '@dockwatch/docker';
import { PathPolicy, ServicesDocumentStore } from '@dockwatch/services-config';
import type { WatcherConfig } from './config/env';
import { EventLoopDriver } from './event-loop';
import { ReloadNotifier, type ReloadTransport } from './reload-notifier';
import { SyncCycle } from './sync-cycle';

export interface WatcherOverrides {
  docker?: DockerApi;
  transport?: ReloadTransport;
}

export interface Watcher {
  driver: EventLoopDriver;
  cycle: SyncCycle;
  servicesFile: string;
}

/**
 * @throws ValidationError if the services file lies outside the allowed directories
 */
export function createWatcher(config: WatcherConfig, logger: Logger, overrides: WatcherOverrides = {}): Watcher {
  const policy = new PathPolicy({
    baseDir: config.allowedDir,
    additionalPrefixes: config.extraPrefixes,
  });
  // Fail at startup rather than on the first event
  const servicesFile = policy.validate(config.servicesFile);

  const docker = overrides.docker ?? createDockerClient({ socketPath: config.docker.socketPath });
  const runtime = new DockerRuntimeClient(docker, logger, { timeoutMs: config.docker.timeoutMs });
  const store = new ServicesDocumentStore(policy, logger);
  const notifier = new ReloadNotifier(config.reload, logger, overrides.transport);

  const cycle = new SyncCycle({
    runtime,
    store,
    notifier,
    logger,
    servicesFile,
    categoryMap: extendCategoryMap(DEFAULT_CATEGORY_MAP, config.categoryOverrides),
  });
  const driver = new EventLoopDriver(runtime, cycle, logger, { syncOnStart: config.syncOnStart });

  return { driver, cycle, servicesFile };
}
