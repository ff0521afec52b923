/**
 * Change detection by content digest of the services file
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { FileAccessError, errorMessage, systemErrorCode } from '@dockwatch/core';

/** Hex SHA-256 of file contents */
export type Digest = string;

export function digestOf(content: string | Buffer): Digest {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Digest of a file, or null when it does not exist
 */
export async function hashFile(filePath: string): Promise<Digest | null> {
  try {
    return digestOf(await fs.readFile(filePath));
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileAccessError(`Failed to read ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      code: systemErrorCode(error),
    });
  }
}

export function hasChanged(before: Digest | null, after: Digest | null): boolean {
  return before !== after;
}
