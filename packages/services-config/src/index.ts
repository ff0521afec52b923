/**
 * @dockwatch/services-config
 *
 * Services file persistence, merge engine and change detection
 */

export { PathPolicy, type PathPolicyConfig } from './path-policy';

export {
  ServicesDocumentStore,
  parseServicesDocument,
  serializeServicesDocument,
  type SaveOptions,
} from './document-store';

export {
  servicesDocumentSchema,
  containerEntrySchema,
  emptyDocument,
  type ServicesDocument,
  type ContainerEntry,
} from './schema';

export { mergeAll, missingDescriptors, toContainerEntry } from './merge';

export {
  mergeIntoSections,
  ensureSections,
  toServiceLink,
  type ServiceLink,
  type ServiceSections,
} from './sections';

export { hashFile, hasChanged, digestOf, type Digest } from './change-detector';
