import { describe, test, expect, vi, beforeEach } from 'vitest';
import { PassThrough } from 'stream';
import {
  createContainerEvent,
  createMockLogger,
  waitFor,
  type MockLogger,
} from '@dockwatch/test-utils';
import {
  ConflictError,
  FileAccessError,
  RuntimeConnectionError,
  type RawEvent,
} from '@dockwatch/core';
import {
  DockerRuntimeClient,
  type DockerApi,
  type RuntimeClient,
  type SubscribeOptions,
} from '@dockwatch/docker';
import { EventLoopDriver, isLifecycleEvent } from '../event-loop';
import type { CycleResult, CycleTrigger } from '../sync-cycle';

function runtimeEmitting(events: RawEvent[]) {
  return {
    listRunningWorkloads: vi.fn(async () => []),
    subscribeEvents: vi.fn(async function* (
      _signal?: AbortSignal,
      _options?: SubscribeOptions
    ): AsyncGenerator<RawEvent> {
      yield* events;
    }),
  } satisfies RuntimeClient;
}

const UNCHANGED: CycleResult = { status: 'unchanged', added: [] };

function createFakeCycle(...results: Array<CycleResult | Error>) {
  const queue = [...results];
  return {
    run: vi.fn(async (_trigger: CycleTrigger): Promise<CycleResult> => {
      const next = queue.shift() ?? UNCHANGED;
      if (next instanceof Error) throw next;
      return next;
    }),
  };
}

describe('isLifecycleEvent', () => {
  test.each(['start', 'die', 'destroy'])('container %s is a lifecycle event', action => {
    expect(isLifecycleEvent(createContainerEvent(action))).toBe(true);
  });

  test.each(['stop', 'attach', 'exec_start: sh', 'health_status: healthy'])('container %s is ignored', action => {
    expect(isLifecycleEvent(createContainerEvent(action))).toBe(false);
  });

  test('non-container events are ignored', () => {
    expect(isLifecycleEvent(createContainerEvent('start', 'web1', 'network'))).toBe(false);
  });
});

describe('EventLoopDriver', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  test('runs a cycle for lifecycle events only', async () => {
    const runtime = runtimeEmitting([
      createContainerEvent('start', 'web1'),
      createContainerEvent('attach', 'web1'),
      createContainerEvent('start', 'bridge', 'network'),
      createContainerEvent('die', 'web1'),
      createContainerEvent('destroy', 'web1'),
    ]);
    const cycle = createFakeCycle();
    const driver = new EventLoopDriver(runtime, cycle, logger, { syncOnStart: false });

    await expect(driver.start()).resolves.toBe('closed');

    expect(cycle.run.mock.calls.map(([trigger]) => trigger)).toEqual([
      { kind: 'event', action: 'start', name: 'web1' },
      { kind: 'event', action: 'die', name: 'web1' },
      { kind: 'event', action: 'destroy', name: 'web1' },
    ]);
  });

  test('syncs once before subscribing by default', async () => {
    const runtime = runtimeEmitting([createContainerEvent('start')]);
    const cycle = createFakeCycle();
    const driver = new EventLoopDriver(runtime, cycle, logger);

    await driver.start();

    expect(cycle.run).toHaveBeenCalledTimes(2);
    expect(cycle.run).toHaveBeenNthCalledWith(1, { kind: 'startup' });
    expect(cycle.run.mock.invocationCallOrder[0]).toBeLessThan(runtime.subscribeEvents.mock.invocationCallOrder[0]);
  });

  test('replays events from before the startup cycle', async () => {
    const runtime = runtimeEmitting([]);
    const driver = new EventLoopDriver(runtime, createFakeCycle(), logger);

    const before = Math.floor(Date.now() / 1000);
    await driver.start();
    const after = Math.floor(Date.now() / 1000);

    const options = runtime.subscribeEvents.mock.calls[0]?.[1];
    expect(options?.since).toBeGreaterThanOrEqual(before);
    expect(options?.since).toBeLessThanOrEqual(after);
  });

  test('subscribes from now when the startup cycle is off', async () => {
    const runtime = runtimeEmitting([]);
    const driver = new EventLoopDriver(runtime, createFakeCycle(), logger, { syncOnStart: false });

    await driver.start();

    expect(runtime.subscribeEvents).toHaveBeenCalledWith(expect.any(AbortSignal), {});
  });

  test('logs conflicts as warnings and keeps going', async () => {
    const runtime = runtimeEmitting([createContainerEvent('start'), createContainerEvent('die')]);
    const cycle = createFakeCycle({ status: 'failed', error: new ConflictError('Services file changed on disk') });
    const driver = new EventLoopDriver(runtime, cycle, logger, { syncOnStart: false });

    await driver.start();

    expect(cycle.run).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'Services file modified concurrently, skipping update',
      expect.objectContaining({ code: 'CONFLICT', error: 'Services file changed on disk' })
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  test('logs other failures as errors and keeps going', async () => {
    const runtime = runtimeEmitting([createContainerEvent('start'), createContainerEvent('die')]);
    const cycle = createFakeCycle({ status: 'failed', error: new FileAccessError('Failed to write /config/services.yaml') });
    const driver = new EventLoopDriver(runtime, cycle, logger, { syncOnStart: false });

    await driver.start();

    expect(cycle.run).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      'Sync cycle failed',
      expect.objectContaining({ code: 'FILE_ACCESS', error: 'Failed to write /config/services.yaml' })
    );
  });

  test('survives a cycle that throws', async () => {
    const runtime = runtimeEmitting([createContainerEvent('start'), createContainerEvent('die')]);
    const cycle = createFakeCycle(new Error('disk on fire'));
    const driver = new EventLoopDriver(runtime, cycle, logger, { syncOnStart: false });

    await expect(driver.start()).resolves.toBe('closed');

    expect(cycle.run).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      'Unexpected error in sync cycle',
      expect.objectContaining({ error: 'disk on fire' })
    );
  });

  test('rejects when the subscription fails', async () => {
    const runtime: RuntimeClient = {
      listRunningWorkloads: async () => [],
      subscribeEvents: async function* () {
        throw new RuntimeConnectionError('Failed to subscribe to runtime events: connect ENOENT');
      },
    };
    const driver = new EventLoopDriver(runtime, createFakeCycle(), logger, { syncOnStart: false });

    await expect(driver.start()).rejects.toThrow(RuntimeConnectionError);
    expect(driver.running).toBe(false);
  });

  test('refuses to start twice', async () => {
    const events = new PassThrough();
    const docker: DockerApi = {
      listContainers: async () => [],
      getContainer: () => ({ inspect: async () => Promise.reject(new Error('unused')) }),
      getEvents: async () => events,
    };
    const driver = new EventLoopDriver(new DockerRuntimeClient(docker, logger), createFakeCycle(), logger, {
      syncOnStart: false,
    });

    const first = driver.start();
    await expect(driver.start()).rejects.toThrow('Event loop is already running');

    driver.stop();
    await expect(first).resolves.toBe('stopped');
  });

  test('stop() ends a live subscription', async () => {
    const events = new PassThrough();
    const docker: DockerApi = {
      listContainers: async () => [],
      getContainer: () => ({ inspect: async () => Promise.reject(new Error('unused')) }),
      getEvents: vi.fn(async () => events),
    };
    const cycle = createFakeCycle();
    const driver = new EventLoopDriver(new DockerRuntimeClient(docker, logger), cycle, logger, {
      syncOnStart: false,
    });

    const done = driver.start();
    await waitFor(() => driver.running && vi.mocked(docker.getEvents).mock.calls.length > 0);
    events.write(`${JSON.stringify({ Type: 'container', Action: 'start', Actor: { ID: 'abc', Attributes: { name: 'web1' } } })}\n`);
    await waitFor(() => cycle.run.mock.calls.length === 1);

    driver.stop();

    await expect(done).resolves.toBe('stopped');
    expect(events.destroyed).toBe(true);
    expect(driver.running).toBe(false);
  });
});
