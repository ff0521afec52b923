/**
 * Common test helper utilities
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: {
    timeout?: number;
    interval?: number;
    message?: string;
  } = {}
): Promise<void> {
  const {
    timeout = 2000,
    interval = 10,
    message = 'Condition not met within timeout'
  } = options;

  const startTime = Date.now();

  while (true) {
    const result = await condition();
    if (result) {
      return;
    }

    if (Date.now() - startTime > timeout) {
      throw new Error(message);
    }

    await delay(interval);
  }
}

/**
 * Delay execution for a specified time
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Temporary directory that tests register as an additional permitted prefix
 */
export interface TempDir {
  path: string;
  file(name: string): string;
  cleanup(): Promise<void>;
}

export async function createTempDir(prefix = 'dockwatch-test-'): Promise<TempDir> {
  const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
  return {
    path: dir,
    file: (name: string) => path.join(dir, name),
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}
