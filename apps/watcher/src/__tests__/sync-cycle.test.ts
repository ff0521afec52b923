/**
 * Sync cycle tests: real document store on a temp directory, fake runtime
 * and notifier
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import {
  createMockLogger,
  createTempDir,
  createWorkloadMetadata,
  type MockLogger,
  type TempDir,
} from '@dockwatch/test-utils';
import { RuntimeConnectionError, type RawEvent, type RawWorkloadMetadata } from '@dockwatch/core';
import type { RuntimeClient } from '@dockwatch/docker';
import { PathPolicy, ServicesDocumentStore } from '@dockwatch/services-config';
import { SyncCycle, type DocumentStore } from '../sync-cycle';
import type { ReloadResult } from '../reload-notifier';

function createFakeRuntime(workloads: RawWorkloadMetadata[] | Error) {
  return {
    listRunningWorkloads: vi.fn(async () => {
      if (workloads instanceof Error) throw workloads;
      return workloads;
    }),
    subscribeEvents: vi.fn(async function* (): AsyncGenerator<RawEvent> {}),
  } satisfies RuntimeClient;
}

function createFakeNotifier(result: ReloadResult = { ok: true, status: 200 }) {
  return { notify: vi.fn(async () => result) };
}

const EXISTING = 'containers:\n  - name: existing_service\n    image: existing_image\n    port: "9090"\n    category: existing_category\n';

describe('SyncCycle', () => {
  let tmp: TempDir;
  let logger: MockLogger;
  let store: ServicesDocumentStore;
  let servicesFile: string;

  beforeEach(async () => {
    tmp = await createTempDir('sync-cycle-test-');
    logger = createMockLogger();
    store = new ServicesDocumentStore(new PathPolicy({ baseDir: tmp.path }), logger);
    servicesFile = tmp.file('services.yaml');
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  test('appends a new workload next to existing entries and notifies once', async () => {
    await fs.writeFile(servicesFile, EXISTING);
    const runtime = createFakeRuntime([
      createWorkloadMetadata({
        name: 'new_container',
        image: 'new_image:latest',
        labels: { 'homepage.group': 'new_category' },
        ports: { '7070/tcp': [{ HostIp: '0.0.0.0', HostPort: '7070' }] },
      }),
    ]);
    const notifier = createFakeNotifier();
    const cycle = new SyncCycle({ runtime, store, notifier, logger, servicesFile });

    const result = await cycle.run({ kind: 'event', action: 'start', name: 'new_container' });

    expect(result).toEqual({ status: 'changed', added: ['new_container'], reload: { ok: true, status: 200 } });
    expect(yaml.load(await fs.readFile(servicesFile, 'utf-8'))).toEqual({
      containers: [
        { name: 'existing_service', image: 'existing_image', port: '9090', category: 'existing_category' },
        { name: 'new_container', image: 'new_image', category: 'new_category', port: '7070' },
      ],
    });
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  test('leaves the file untouched and skips notify when nothing is new', async () => {
    await fs.writeFile(servicesFile, EXISTING);
    const runtime = createFakeRuntime([
      createWorkloadMetadata({ name: 'existing_service', image: 'something_else:2' }),
    ]);
    const notifier = createFakeNotifier();
    const cycle = new SyncCycle({ runtime, store, notifier, logger, servicesFile });

    const result = await cycle.run({ kind: 'startup' });

    expect(result).toEqual({ status: 'unchanged', added: [] });
    expect(await fs.readFile(servicesFile, 'utf-8')).toBe(EXISTING);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  test('a second run over the same workloads changes nothing', async () => {
    await fs.writeFile(servicesFile, 'containers: []\n');
    const runtime = createFakeRuntime([createWorkloadMetadata()]);
    const notifier = createFakeNotifier();
    const cycle = new SyncCycle({ runtime, store, notifier, logger, servicesFile });

    await cycle.run({ kind: 'startup' });
    const afterFirst = await fs.readFile(servicesFile, 'utf-8');
    const second = await cycle.run({ kind: 'event', action: 'die', name: 'web1' });

    expect(second).toEqual({ status: 'unchanged', added: [] });
    expect(await fs.readFile(servicesFile, 'utf-8')).toBe(afterFirst);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  test('uses the configured category map', async () => {
    await fs.writeFile(servicesFile, 'containers: []\n');
    const runtime = createFakeRuntime([createWorkloadMetadata({ name: 'git', image: 'gitea/gitea:1.21', ports: {} })]);
    const cycle = new SyncCycle({
      runtime,
      store,
      notifier: createFakeNotifier(),
      logger,
      servicesFile,
      categoryMap: { gitea: 'dev' },
    });

    await cycle.run({ kind: 'startup' });

    expect(yaml.load(await fs.readFile(servicesFile, 'utf-8'))).toEqual({
      containers: [{ name: 'git', image: 'gitea/gitea', category: 'dev', port: 'N/A' }],
    });
  });

  test('reports a missing services file as NOT_FOUND', async () => {
    const notifier = createFakeNotifier();
    const cycle = new SyncCycle({
      runtime: createFakeRuntime([createWorkloadMetadata()]),
      store,
      notifier,
      logger,
      servicesFile,
    });

    const result = await cycle.run({ kind: 'startup' });

    expect(result.status).toBe('failed');
    expect(result.status === 'failed' && result.error.code).toBe('NOT_FOUND');
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  test('reports runtime failures without touching the file', async () => {
    await fs.writeFile(servicesFile, EXISTING);
    const cycle = new SyncCycle({
      runtime: createFakeRuntime(new RuntimeConnectionError('Failed to list containers: connect ENOENT')),
      store,
      notifier: createFakeNotifier(),
      logger,
      servicesFile,
    });

    const result = await cycle.run({ kind: 'startup' });

    expect(result.status === 'failed' && result.error.code).toBe('RUNTIME_UNAVAILABLE');
    expect(await fs.readFile(servicesFile, 'utf-8')).toBe(EXISTING);
  });

  test('wraps unexpected errors', async () => {
    await fs.writeFile(servicesFile, EXISTING);
    const cycle = new SyncCycle({
      runtime: createFakeRuntime(new TypeError('boom')),
      store,
      notifier: createFakeNotifier(),
      logger,
      servicesFile,
    });

    const result = await cycle.run({ kind: 'startup' });

    expect(result.status === 'failed' && result.error.code).toBe('UNEXPECTED');
    expect(result.status === 'failed' && result.error.message).toBe('boom');
  });

  test('refuses to overwrite a file edited between load and save', async () => {
    await fs.writeFile(servicesFile, EXISTING);
    const edited = 'containers: []\nedited: true\n';
    const racingStore: DocumentStore = {
      load: async filePath => {
        const document = await store.load(filePath);
        await fs.writeFile(filePath, edited);
        return document;
      },
      save: (filePath, document, options) => store.save(filePath, document, options),
      digest: filePath => store.digest(filePath),
    };
    const notifier = createFakeNotifier();
    const cycle = new SyncCycle({
      runtime: createFakeRuntime([createWorkloadMetadata()]),
      store: racingStore,
      notifier,
      logger,
      servicesFile,
    });

    const result = await cycle.run({ kind: 'startup' });

    expect(result.status === 'failed' && result.error.code).toBe('CONFLICT');
    expect(await fs.readFile(servicesFile, 'utf-8')).toBe(edited);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  test('a failed reload still reports the change', async () => {
    await fs.writeFile(servicesFile, 'containers: []\n');
    const cycle = new SyncCycle({
      runtime: createFakeRuntime([createWorkloadMetadata()]),
      store,
      notifier: createFakeNotifier({ ok: false, status: 502, error: 'HTTP 502: Bad Gateway' }),
      logger,
      servicesFile,
    });

    const result = await cycle.run({ kind: 'startup' });

    expect(result).toEqual({
      status: 'changed',
      added: ['web1'],
      reload: { ok: false, status: 502, error: 'HTTP 502: Bad Gateway' },
    });
  });
});
