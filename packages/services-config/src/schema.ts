/**
 * Services document schema
 *
 * The committed on-disk format is the flat `containers` list:
 *
 * ```yaml
 * containers:
 *   - name: web1
 *     image: nginx
 *     category: services
 *     port: "8080"
 * ```
 *
 * Entries only need a string `name`; any other fields and any other
 * top-level keys are carried through untouched.
 */

import { z } from 'zod';

export const containerEntrySchema = z.object({ name: z.string() }).passthrough();

export const servicesDocumentSchema = z
  .object({
    containers: z
      .array(containerEntrySchema)
      .nullish()
      .transform(entries => entries ?? []),
  })
  .passthrough();

export type ContainerEntry = z.infer<typeof containerEntrySchema>;

export interface ServicesDocument {
  containers: ContainerEntry[];
  [key: string]: unknown;
}

export function emptyDocument(): ServicesDocument {
  return { containers: [] };
}
