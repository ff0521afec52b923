/**
 * Workload and runtime event types shared between the runtime adapter,
 * the services file store and the watcher.
 */

/** Port value written when a workload publishes no host port */
export const UNKNOWN_PORT = 'N/A';

/** Category used when neither a label nor the category map classifies a workload */
export const DEFAULT_CATEGORY = 'services';

/**
 * Normalized record derived from one running workload.
 * `name` is the unique key inside a services document.
 */
export interface WorkloadDescriptor {
  readonly name: string;
  readonly image: string;
  readonly category: string;
  readonly port: string;
}

/**
 * One host-side binding of a published container port
 */
export interface PortBinding {
  HostIp?: string;
  HostPort?: string;
}

/**
 * Published ports keyed by `<containerPort>/<protocol>`, e.g. `80/tcp`.
 * A `null` value means the port is exposed but not published.
 */
export type PortMap = Record<string, PortBinding[] | null>;

/**
 * Raw metadata of a running workload as reported by the runtime
 */
export interface RawWorkloadMetadata {
  id: string;
  name: string;
  image: string;
  labels: Record<string, string>;
  ports: PortMap;
}

/**
 * A runtime event, decoded from `{ Type, Action, Actor: { ID, Attributes } }`
 */
export interface RawEvent {
  type: string;
  action: string;
  actor: {
    id?: string;
    attributes: Record<string, string>;
  };
  time?: number;
}

/**
 * Image basename to category label
 */
export type CategoryMap = Readonly<Record<string, string>>;
