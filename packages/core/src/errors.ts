/**
 * Common error classes
 *
 * Every failure a sync cycle can report is one of these, so callers can
 * branch on `code` instead of inspecting messages.
 */

export type ErrorDetails = Record<string, unknown>;

export type DockwatchErrorCode =
  | 'RUNTIME_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'FILE_ACCESS'
  | 'VALIDATION_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'CONFLICT'
  | 'UNEXPECTED';

/**
 * Base error class for dockwatch
 */
export class DockwatchError extends Error {
  constructor(
    message: string,
    public readonly code: DockwatchErrorCode,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = 'DockwatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when the container runtime socket cannot be reached
 */
export class RuntimeConnectionError extends DockwatchError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RUNTIME_UNAVAILABLE', details);
    this.name = 'RuntimeConnectionError';
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends DockwatchError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} '${id}' not found` : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a file exists but cannot be read or written
 */
export class FileAccessError extends DockwatchError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'FILE_ACCESS', details);
    this.name = 'FileAccessError';
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends DockwatchError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a document cannot be parsed or does not have the expected shape
 */
export class SerializationError extends DockwatchError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SERIALIZATION_ERROR', details);
    this.name = 'SerializationError';
  }
}

/**
 * Error thrown when operation would conflict with existing data
 */
export class ConflictError extends DockwatchError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

/**
 * Normalize anything thrown into a DockwatchError
 */
export function toDockwatchError(error: unknown): DockwatchError {
  if (error instanceof DockwatchError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DockwatchError(message, 'UNEXPECTED', {
    cause: error instanceof Error ? error.name : typeof error,
  });
}

/**
 * Read the `code` property Node attaches to system errors (ENOENT, EACCES, ...)
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
