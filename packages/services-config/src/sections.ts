/**
 * Category-bucketed merge
 *
 * Some dashboards group services under one key per category, each holding
 * `{ name, url, icon }` links. The persisted format stays the flat
 * `containers` list; this is the conversion for callers that render the
 * grouped layout.
 */

import { UNKNOWN_PORT, type WorkloadDescriptor } from '@dockwatch/core';

export interface ServiceLink {
  name: string;
  url: string;
  icon: string;
}

export type ServiceSections = Record<string, ServiceLink[]>;

export function toServiceLink(descriptor: WorkloadDescriptor): ServiceLink {
  return {
    name: descriptor.name,
    url: descriptor.port === UNKNOWN_PORT ? UNKNOWN_PORT : `http://localhost:${descriptor.port}`,
    icon: descriptor.image,
  };
}

/**
 * Add an empty section for every category that has none
 */
export function ensureSections(sections: ServiceSections, categories: readonly string[]): ServiceSections {
  const result: ServiceSections = { ...sections };
  for (const category of categories) {
    if (!Object.hasOwn(result, category)) {
      result[category] = [];
    }
  }
  return result;
}

/**
 * Append each descriptor under its category, skipping names that section
 * already holds
 */
export function mergeIntoSections(
  sections: ServiceSections,
  descriptors: readonly WorkloadDescriptor[]
): ServiceSections {
  const result: ServiceSections = {};
  for (const [category, links] of Object.entries(sections)) {
    result[category] = [...links];
  }

  for (const descriptor of descriptors) {
    const section = Object.hasOwn(result, descriptor.category) ? result[descriptor.category] : undefined;
    if (section === undefined) {
      result[descriptor.category] = [toServiceLink(descriptor)];
    } else if (!section.some(link => link.name === descriptor.name)) {
      section.push(toServiceLink(descriptor));
    }
  }
  return result;
}
