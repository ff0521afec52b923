/**
 * Runtime Client Adapter
 *
 * Wraps the Docker socket API: lists running workloads with their metadata
 * and subscribes to the live event stream. The dockerode client is passed
 * in; nothing here holds global state.
 */

import Docker from 'dockerode';
import { Readable } from 'stream';
import {
  RuntimeConnectionError,
  errorMessage,
  type Logger,
  type PortMap,
  type RawEvent,
  type RawWorkloadMetadata,
} from '@dockwatch/core';
import { decodeEvents } from './event-stream';

/**
 * Inspect data the adapter reads. `Docker.ContainerInspectInfo` satisfies it.
 */
export interface InspectedContainer {
  Id: string;
  Name: string;
  Config: {
    Image: string;
    Labels: Record<string, string> | null;
  };
  NetworkSettings: {
    Ports: PortMap | null;
  };
}

/**
 * The slice of the dockerode API the adapter uses
 */
export interface DockerApi {
  listContainers(): Promise<Array<Pick<Docker.ContainerInfo, 'Id' | 'Names'>>>;
  getContainer(id: string): { inspect(): Promise<InspectedContainer> };
  getEvents(options?: Docker.GetEventsOptions): Promise<NodeJS.ReadableStream>;
}

export interface RuntimeClient {
  /**
   * Metadata of every running workload
   */
  listRunningWorkloads(): Promise<RawWorkloadMetadata[]>;

  /**
   * Live runtime events. Infinite until the runtime closes the stream or
   * the signal aborts; a finished subscription cannot be restarted.
   */
  subscribeEvents(signal?: AbortSignal, options?: SubscribeOptions): AsyncIterable<RawEvent>;
}

export interface SubscribeOptions {
  /** Unix seconds; events from this point on are replayed before live ones */
  since?: number;
}

export interface DockerClientOptions {
  socketPath: string;
}

export interface RuntimeClientOptions {
  /** Upper bound on each list/inspect call and on opening the event stream; the stream itself is not bounded */
  timeoutMs?: number;
}

/**
 * Build a dockerode client for a local socket. No client-level timeout is
 * set because it would also cut the long-lived event stream.
 */
export function createDockerClient(options: DockerClientOptions): Docker {
  return new Docker({ socketPath: options.socketPath });
}

async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function toWorkloadMetadata(info: InspectedContainer): RawWorkloadMetadata {
  return {
    id: info.Id,
    name: info.Name.replace(/^\//, ''),
    image: info.Config.Image,
    labels: info.Config.Labels ?? {},
    ports: info.NetworkSettings.Ports ?? {},
  };
}

export class DockerRuntimeClient implements RuntimeClient {
  private logger: Logger;
  private timeoutMs: number;

  constructor(
    private docker: DockerApi,
    logger: Logger,
    options: RuntimeClientOptions = {}
  ) {
    this.logger = logger.child({ component: 'runtime-client' });
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async listRunningWorkloads(): Promise<RawWorkloadMetadata[]> {
    let containers: Array<Pick<Docker.ContainerInfo, 'Id' | 'Names'>>;
    try {
      containers = await withTimeout(this.docker.listContainers(), this.timeoutMs, 'listContainers');
    } catch (error) {
      throw new RuntimeConnectionError(`Failed to list containers: ${errorMessage(error)}`, {
        operation: 'listContainers',
      });
    }

    const workloads: RawWorkloadMetadata[] = [];
    for (const container of containers) {
      try {
        const info = await withTimeout(this.docker.getContainer(container.Id).inspect(), this.timeoutMs, 'inspect');
        workloads.push(toWorkloadMetadata(info));
      } catch (error) {
        if (statusCodeOf(error) === 404) {
          // Removed between list and inspect
          this.logger.debug('Container vanished before inspect', { id: container.Id, names: container.Names });
          continue;
        }
        throw new RuntimeConnectionError(`Failed to inspect container ${container.Id}: ${errorMessage(error)}`, {
          operation: 'inspect',
          id: container.Id,
        });
      }
    }

    this.logger.debug('Listed running workloads', { count: workloads.length });
    return workloads;
  }

  async *subscribeEvents(signal?: AbortSignal, options: SubscribeOptions = {}): AsyncGenerator<RawEvent> {
    const query: Docker.GetEventsOptions = { filters: { type: ['container'] } };
    if (options.since !== undefined) {
      query.since = options.since;
    }

    let stream: NodeJS.ReadableStream;
    try {
      stream = await withTimeout(this.docker.getEvents(query), this.timeoutMs, 'getEvents');
    } catch (error) {
      throw new RuntimeConnectionError(`Failed to subscribe to runtime events: ${errorMessage(error)}`, {
        operation: 'getEvents',
      });
    }

    const close = (): void => {
      if (stream instanceof Readable && !stream.destroyed) {
        stream.destroy();
      }
    };
    if (signal?.aborted) {
      close();
      return;
    }
    signal?.addEventListener('abort', close, { once: true });
    this.logger.info('Subscribed to runtime events', { since: options.since });

    try {
      yield* decodeEvents(stream, this.logger);
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw new RuntimeConnectionError(`Runtime event stream failed: ${errorMessage(error)}`, {
        operation: 'events',
      });
    } finally {
      signal?.removeEventListener('abort', close);
      close();
    }
  }
}
