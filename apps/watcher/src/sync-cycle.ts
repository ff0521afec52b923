/**
 * Sync Cycle
 *
 * One pass of list -> extract -> load -> merge -> save -> hash -> notify.
 * Failures are returned as a typed result; the event loop decides how loud
 * to be about them.
 */

import {
  toDockwatchError,
  type CategoryMap,
  type DockwatchError,
  type Logger,
} from '@dockwatch/core';
import { DEFAULT_CATEGORY_MAP, extractDescriptors, type RuntimeClient } from '@dockwatch/docker';
import {
  hasChanged,
  mergeAll,
  missingDescriptors,
  type ServicesDocumentStore,
} from '@dockwatch/services-config';
import type { ReloadNotifier, ReloadResult } from './reload-notifier';

export type CycleTrigger =
  | { kind: 'startup' }
  | { kind: 'event'; action: string; name?: string };

export type CycleResult =
  | { status: 'changed'; added: string[]; reload: ReloadResult }
  | { status: 'unchanged'; added: string[] }
  | { status: 'failed'; error: DockwatchError };

export type DocumentStore = Pick<ServicesDocumentStore, 'load' | 'save' | 'digest'>;
export type Notifier = Pick<ReloadNotifier, 'notify'>;

export interface SyncCycleDeps {
  runtime: RuntimeClient;
  store: DocumentStore;
  notifier: Notifier;
  logger: Logger;
  servicesFile: string;
  categoryMap?: CategoryMap;
}

export class SyncCycle {
  private runtime: RuntimeClient;
  private store: DocumentStore;
  private notifier: Notifier;
  private logger: Logger;
  private servicesFile: string;
  private categoryMap: CategoryMap;

  constructor(deps: SyncCycleDeps) {
    this.runtime = deps.runtime;
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.logger = deps.logger.child({ component: 'sync-cycle' });
    this.servicesFile = deps.servicesFile;
    this.categoryMap = deps.categoryMap ?? DEFAULT_CATEGORY_MAP;
  }

  async run(trigger: CycleTrigger): Promise<CycleResult> {
    this.logger.debug('Sync cycle started', { trigger });

    try {
      const workloads = await this.runtime.listRunningWorkloads();
      const descriptors = extractDescriptors(workloads, this.categoryMap);

      const before = await this.store.digest(this.servicesFile);
      const document = await this.store.load(this.servicesFile);
      const added = missingDescriptors(document, descriptors).map(descriptor => descriptor.name);

      // Nothing to append: leave the file (and its formatting) untouched
      if (added.length === 0) {
        this.logger.debug('Services file already lists every running workload', {
          running: descriptors.length,
        });
        return { status: 'unchanged', added };
      }

      await this.store.save(this.servicesFile, mergeAll(document, descriptors), { expectedDigest: before });
      const after = await this.store.digest(this.servicesFile);

      if (!hasChanged(before, after)) {
        return { status: 'unchanged', added };
      }

      this.logger.info('Services file updated', { added });
      const reload = await this.notifier.notify();
      return { status: 'changed', added, reload };
    } catch (error) {
      return { status: 'failed', error: toDockwatchError(error) };
    }
  }
}
