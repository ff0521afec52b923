/**
 * Merge Engine
 *
 * Appends descriptors for workloads the document does not list yet.
 * Entries are matched by name only; an existing entry is never updated.
 */

import type { WorkloadDescriptor } from '@dockwatch/core';
import type { ContainerEntry, ServicesDocument } from './schema';

export function toContainerEntry(descriptor: WorkloadDescriptor): ContainerEntry {
  return {
    name: descriptor.name,
    image: descriptor.image,
    category: descriptor.category,
    port: descriptor.port,
  };
}

/**
 * Descriptors, in input order, whose name is neither in the document nor
 * earlier in the same batch
 */
export function missingDescriptors(
  document: ServicesDocument,
  descriptors: readonly WorkloadDescriptor[]
): WorkloadDescriptor[] {
  const known = new Set(document.containers.map(entry => entry.name));
  const missing: WorkloadDescriptor[] = [];

  for (const descriptor of descriptors) {
    if (known.has(descriptor.name)) {
      continue;
    }
    known.add(descriptor.name);
    missing.push(descriptor);
  }
  return missing;
}

/**
 * Return a new document with every missing descriptor appended to `containers`
 */
export function mergeAll(
  document: ServicesDocument,
  descriptors: readonly WorkloadDescriptor[]
): ServicesDocument {
  const missing = missingDescriptors(document, descriptors);
  return {
    ...document,
    containers: [...document.containers, ...missing.map(toContainerEntry)],
  };
}
