/**
 * @dockwatch/core
 *
 * Shared types, the logger contract and the error taxonomy used by every
 * dockwatch package.
 */

// Logger
export type { Logger, LogMeta } from './logger';
export { errorMessage } from './logger';

// Errors
export {
  DockwatchError,
  RuntimeConnectionError,
  NotFoundError,
  FileAccessError,
  ValidationError,
  SerializationError,
  ConflictError,
  toDockwatchError,
  systemErrorCode,
} from './errors';
export type { DockwatchErrorCode, ErrorDetails } from './errors';
export { ConfigurationError } from './configuration-error';

// Validation
export { formatIssues } from './validation';

// Workload types
export { UNKNOWN_PORT, DEFAULT_CATEGORY } from './workload-types';
export type {
  WorkloadDescriptor,
  RawWorkloadMetadata,
  RawEvent,
  PortBinding,
  PortMap,
  CategoryMap,
} from './workload-types';
