/**
 * Logger interface for observability
 *
 * This interface is intentionally framework-agnostic so packages can log
 * without depending on a concrete logger. The watcher app supplies a
 * winston logger, which satisfies it structurally.
 *
 * Example usage:
 * ```typescript
 * import winston from 'winston';
 *
 * const logger = winston.createLogger({
 *   level: 'debug',
 *   transports: [new winston.transports.Console()]
 * });
 *
 * const store = new ServicesDocumentStore(policy, logger);
 * ```
 */
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

/**
 * Render an unknown thrown value for structured log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
