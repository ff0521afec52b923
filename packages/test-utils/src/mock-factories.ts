/**
 * Reusable mock factories for common test scenarios
 */

import { vi, type Mock } from 'vitest';
import type {
  Logger,
  LogMeta,
  RawEvent,
  RawWorkloadMetadata,
  WorkloadDescriptor,
} from '@dockwatch/core';

type LogMethod = (message: string, meta?: LogMeta) => void;

export interface MockLogger extends Logger {
  debug: Mock<Parameters<LogMethod>, void>;
  info: Mock<Parameters<LogMethod>, void>;
  warn: Mock<Parameters<LogMethod>, void>;
  error: Mock<Parameters<LogMethod>, void>;
  child: Mock<[LogMeta], Logger>;
}

/**
 * Create a logger whose methods are spies; `child()` returns the same logger
 */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn<Parameters<LogMethod>, void>(),
    info: vi.fn<Parameters<LogMethod>, void>(),
    warn: vi.fn<Parameters<LogMethod>, void>(),
    error: vi.fn<Parameters<LogMethod>, void>(),
    child: vi.fn<[LogMeta], Logger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/**
 * Create raw workload metadata as the runtime adapter reports it
 */
export function createWorkloadMetadata(overrides: Partial<RawWorkloadMetadata> = {}): RawWorkloadMetadata {
  return {
    id: 'c0ffee000001',
    name: 'web1',
    image: 'nginx:1.25',
    labels: {},
    ports: { '80/tcp': [{ HostIp: '0.0.0.0', HostPort: '8080' }] },
    ...overrides,
  };
}

/**
 * Create a workload descriptor
 */
export function createDescriptor(overrides: Partial<WorkloadDescriptor> = {}): WorkloadDescriptor {
  return {
    name: 'web1',
    image: 'nginx',
    category: 'services',
    port: '8080',
    ...overrides,
  };
}

/**
 * Create a container lifecycle event
 */
export function createContainerEvent(action: string, name = 'web1', type = 'container'): RawEvent {
  return {
    type,
    action,
    actor: {
      id: 'c0ffee000001',
      attributes: { name },
    },
  };
}
