// Environment Configuration
// All settings come from DOCKWATCH_* variables, validated with zod
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from '@dockwatch/core';
import type { LoggingSettings, NodeEnv } from '../logger';

const absolutePath = z
  .string()
  .refine(value => path.isAbsolute(value), 'Must be an absolute path');

const positiveMs = z.coerce.number().int().positive();

const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item !== ''));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

// "gitea=dev,plex=media"
const categoryPairs = commaList.transform((pairs, ctx) => {
  const map: Record<string, string> = {};
  for (const pair of pairs) {
    const [image, category, ...rest] = pair.split('=').map(part => part.trim());
    if (!image || !category || rest.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected image=category, got '${pair}'` });
      continue;
    }
    map[image] = category;
  }
  return map;
});

function isHttpUrl(value: string): boolean {
  try {
    return ['http:', 'https:'].includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, 'Must be an http(s) URL');

// Define the schema for validation
const envSchema = z.object({
  DOCKWATCH_SERVICES_FILE: absolutePath.default('/config/services.yaml'),
  DOCKWATCH_ALLOWED_DIR: absolutePath.optional(),
  DOCKWATCH_EXTRA_PREFIXES: commaList
    .refine(prefixes => prefixes.every(prefix => path.isAbsolute(prefix)), 'Prefixes must be absolute paths')
    .default(''),
  DOCKWATCH_RELOAD_URL: httpUrl.default('http://localhost:3000/api/reload'),
  DOCKWATCH_RELOAD_TIMEOUT_MS: positiveMs.default(5000),
  DOCKER_SOCKET: absolutePath.default('/var/run/docker.sock'),
  DOCKWATCH_DOCKER_TIMEOUT_MS: positiveMs.default(10000),
  DOCKWATCH_SYNC_ON_START: booleanFlag.default('true'),
  DOCKWATCH_CATEGORIES: categoryPairs.default(''),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('json'),
  LOG_FILE: z.string().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export interface WatcherConfig {
  servicesFile: string;
  allowedDir: string;
  extraPrefixes: string[];
  reload: {
    url: string;
    timeoutMs: number;
  };
  docker: {
    socketPath: string;
    timeoutMs: number;
  };
  syncOnStart: boolean;
  categoryOverrides: Record<string, string>;
  logging: LoggingSettings;
  nodeEnv: NodeEnv;
}

/**
 * Parse and validate watcher configuration. Empty variables count as unset.
 * @throws ConfigurationError listing every invalid variable
 */
export function loadWatcherConfig(env: NodeJS.ProcessEnv = process.env): WatcherConfig {
  const provided = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
  );

  const result = envSchema.safeParse(provided);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid watcher configuration',
      formatIssues(result.error),
      'Check the DOCKWATCH_* environment variables'
    );
  }

  const parsed = result.data;
  return {
    servicesFile: parsed.DOCKWATCH_SERVICES_FILE,
    allowedDir: parsed.DOCKWATCH_ALLOWED_DIR ?? path.dirname(parsed.DOCKWATCH_SERVICES_FILE),
    extraPrefixes: parsed.DOCKWATCH_EXTRA_PREFIXES,
    reload: {
      url: parsed.DOCKWATCH_RELOAD_URL,
      timeoutMs: parsed.DOCKWATCH_RELOAD_TIMEOUT_MS,
    },
    docker: {
      socketPath: parsed.DOCKER_SOCKET,
      timeoutMs: parsed.DOCKWATCH_DOCKER_TIMEOUT_MS,
    },
    syncOnStart: parsed.DOCKWATCH_SYNC_ON_START,
    categoryOverrides: parsed.DOCKWATCH_CATEGORIES,
    logging: {
      level: parsed.LOG_LEVEL,
      format: parsed.LOG_FORMAT,
      file: parsed.LOG_FILE,
    },
    nodeEnv: parsed.NODE_ENV,
  };
}
