import type { CategoryMap } from '@dockwatch/core';

/**
 * Categories for well-known images, keyed by lowercased image basename.
 * Only consulted when a container carries no `homepage.group` label.
 */
export const DEFAULT_CATEGORY_MAP: CategoryMap = Object.freeze({
  plex: 'media',
  jellyfin: 'media',
  radarr: 'media',
  sonarr: 'media',
  grafana: 'monitoring',
  prometheus: 'monitoring',
  pihole: 'network',
  home_assistant: 'home-automation',
  traefik: 'services',
  portainer: 'services',
  nginx: 'services',
});

/**
 * Layer overrides on top of a base map. Keys are lowercased so lookups by
 * basename stay case-insensitive.
 */
export function extendCategoryMap(base: CategoryMap, overrides: Record<string, string>): CategoryMap {
  const merged: Record<string, string> = { ...base };
  for (const [image, category] of Object.entries(overrides)) {
    merged[image.toLowerCase()] = category.toLowerCase();
  }
  return Object.freeze(merged);
}

/**
 * Distinct category labels of a map, in first-seen order
 */
export function categoriesOf(map: CategoryMap): string[] {
  return [...new Set(Object.values(map))];
}
