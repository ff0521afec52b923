/**
 * Workload Descriptor Extraction
 *
 * Pure functions turning raw runtime metadata into the normalized
 * {name, image, category, port} record written to the services file.
 */

import {
  DEFAULT_CATEGORY,
  UNKNOWN_PORT,
  type CategoryMap,
  type PortMap,
  type RawWorkloadMetadata,
  type WorkloadDescriptor,
} from '@dockwatch/core';
import { DEFAULT_CATEGORY_MAP } from './categories';

const GROUP_LABEL = 'homepage.group';

/**
 * Strip the digest and tag from an image reference.
 *
 * `nginx:1.25` -> `nginx`, `ghcr.io/org/app@sha256:...` -> `ghcr.io/org/app`.
 * A colon before the last `/` belongs to a registry host and is kept:
 * `localhost:5000/app:2` -> `localhost:5000/app`.
 */
export function stripImageTag(reference: string): string {
  const digestAt = reference.indexOf('@');
  const withoutDigest = digestAt === -1 ? reference : reference.slice(0, digestAt);

  const colon = withoutDigest.lastIndexOf(':');
  if (colon > withoutDigest.lastIndexOf('/')) {
    return withoutDigest.slice(0, colon);
  }
  return withoutDigest;
}

/**
 * Last path segment of an image name, e.g. `linuxserver/plex` -> `plex`
 */
export function imageBasename(image: string): string {
  return image.slice(image.lastIndexOf('/') + 1);
}

/**
 * Category from the first label whose key contains `homepage.group`
 */
export function categoryFromLabels(labels: Record<string, string>): string | undefined {
  for (const [key, value] of Object.entries(labels)) {
    if (key.toLowerCase().includes(GROUP_LABEL) && value.trim() !== '') {
      return value.trim().toLowerCase();
    }
  }
  return undefined;
}

export function resolveCategory(
  labels: Record<string, string>,
  image: string,
  categoryMap: CategoryMap = DEFAULT_CATEGORY_MAP
): string {
  const fromLabels = categoryFromLabels(labels);
  if (fromLabels) {
    return fromLabels;
  }
  const key = imageBasename(image).toLowerCase();
  const mapped = Object.hasOwn(categoryMap, key) ? categoryMap[key] : undefined;
  return mapped || DEFAULT_CATEGORY;
}

interface PortKey {
  key: string;
  port: number;
  protocol: string;
}

function parsePortKey(key: string): PortKey {
  const [portPart = '', protocol = 'tcp'] = key.split('/');
  const port = Number.parseInt(portPart, 10);
  return { key, port: Number.isNaN(port) ? Number.MAX_SAFE_INTEGER : port, protocol };
}

function comparePortKeys(a: PortKey, b: PortKey): number {
  if (a.port !== b.port) return a.port - b.port;
  if (a.protocol !== b.protocol) {
    if (a.protocol === 'tcp') return -1;
    if (b.protocol === 'tcp') return 1;
  }
  return a.key.localeCompare(b.key);
}

/**
 * Host port of the published binding with the lowest container-side port.
 * Ties on the port number prefer tcp, then fall back to key order.
 */
export function selectPublishedPort(ports: PortMap): string {
  const keys = Object.keys(ports).map(parsePortKey).sort(comparePortKeys);

  for (const { key } of keys) {
    const hostPort = ports[key]?.find(binding => binding.HostPort)?.HostPort;
    if (hostPort) {
      return hostPort;
    }
  }
  return UNKNOWN_PORT;
}

/**
 * Derive the descriptor of one running workload
 */
export function extractDescriptor(
  raw: RawWorkloadMetadata,
  categoryMap: CategoryMap = DEFAULT_CATEGORY_MAP
): WorkloadDescriptor {
  const image = stripImageTag(raw.image);
  return {
    name: raw.name,
    image,
    category: resolveCategory(raw.labels, image, categoryMap),
    port: selectPublishedPort(raw.ports),
  };
}

export function extractDescriptors(
  raws: readonly RawWorkloadMetadata[],
  categoryMap: CategoryMap = DEFAULT_CATEGORY_MAP
): WorkloadDescriptor[] {
  return raws.map(raw => extractDescriptor(raw, categoryMap));
}
