/**
 * Watcher Logger
 *
 * Winston-based logging with configurable log levels and structured metadata.
 * The returned logger satisfies the `Logger` contract from @dockwatch/core,
 * so it can be handed straight to the library packages.
 */

import winston from 'winston';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

export type LogFormat = 'json' | 'simple';

export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Logging settings as validated by the environment schema
 */
export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
  file?: string;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  transports: ('console' | 'file')[];
  filename?: string;
}

/**
 * Resolve transports for the validated settings. Test runs only log
 * errors to the console.
 */
export function getLoggerConfig(settings: LoggingSettings, nodeEnv: NodeEnv): LoggerConfig {
  if (nodeEnv === 'test') {
    return {
      level: 'error',
      format: 'simple',
      transports: ['console']
    };
  }

  const { level, format, file } = settings;
  if (file) {
    return { level, format, transports: ['console', 'file'], filename: file };
  }
  return { level, format, transports: ['console'] };
}

/**
 * Create Winston format based on configuration
 */
export function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Create Winston transports based on configuration
 */
export function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.transports.includes('console')) {
    transports.push(new winston.transports.Console({ level: config.level }));
  }

  if (config.transports.includes('file') && config.filename) {
    transports.push(new winston.transports.File({ filename: config.filename, level: config.level }));
  }

  return transports;
}

/**
 * Create the process logger
 * Call this once at application startup and pass the result down
 */
export function initializeLogger(settings: LoggingSettings, nodeEnv: NodeEnv): winston.Logger {
  const config = getLoggerConfig(settings, nodeEnv);

  const logger = winston.createLogger({
    level: config.level,
    format: createFormat(config),
    transports: createTransports(config),
    exitOnError: false
  });

  logger.debug('Logger initialized', {
    level: config.level,
    format: config.format,
    transports: config.transports
  });

  return logger;
}
