/**
 * Services Document Store
 *
 * Loads and saves the services YAML file. Writes go to a temp file in the
 * same directory and are renamed over the target, so readers only ever see
 * the old or the new content. A caller that loaded the file can pass the
 * digest it saw; the save is refused if the file changed since.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  ConflictError,
  FileAccessError,
  NotFoundError,
  SerializationError,
  errorMessage,
  formatIssues,
  systemErrorCode,
  type Logger,
} from '@dockwatch/core';
import { PathPolicy } from './path-policy';
import { emptyDocument, servicesDocumentSchema, type ServicesDocument } from './schema';
import { hashFile, type Digest } from './change-detector';

export interface SaveOptions {
  /**
   * Digest the file had when it was loaded (`null` if it was absent).
   * When set, the save fails with ConflictError if the file has changed.
   */
  expectedDigest?: Digest | null;
}

/**
 * Parse YAML text into a services document
 * @throws SerializationError for invalid YAML or an unexpected shape
 */
export function parseServicesDocument(content: string, source = 'services file'): ServicesDocument {
  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: source });
  } catch (error) {
    throw new SerializationError(`Invalid YAML in ${source}: ${errorMessage(error)}`, { path: source });
  }

  if (raw === undefined || raw === null) {
    return emptyDocument();
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new SerializationError(`${source} must contain a YAML mapping at the top level`, { path: source });
  }

  const result = servicesDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new SerializationError(`Unexpected structure in ${source}: ${issues.join(', ')}`, {
      path: source,
      issues,
    });
  }
  return result.data;
}

export function serializeServicesDocument(document: ServicesDocument): string {
  try {
    return yaml.dump(document, { noRefs: true, lineWidth: -1 });
  } catch (error) {
    throw new SerializationError(`Failed to serialize services document: ${errorMessage(error)}`);
  }
}

export class ServicesDocumentStore {
  private logger: Logger;

  constructor(
    private policy: PathPolicy,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'document-store' });
  }

  /**
   * Load the services document
   * @throws ValidationError, NotFoundError, FileAccessError, SerializationError
   */
  async load(filePath: string): Promise<ServicesDocument> {
    const resolved = this.policy.validate(filePath);

    let content: string;
    try {
      content = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        throw new NotFoundError('Services file', resolved);
      }
      throw new FileAccessError(`Failed to read ${resolved}: ${errorMessage(error)}`, {
        path: resolved,
        code: systemErrorCode(error),
      });
    }

    const document = parseServicesDocument(content, resolved);
    this.logger.info('Loaded services file', { path: resolved, entries: document.containers.length });
    return document;
  }

  /**
   * Digest of the services file, or null when it does not exist
   * @throws ValidationError, FileAccessError
   */
  async digest(filePath: string): Promise<Digest | null> {
    return hashFile(this.policy.validate(filePath));
  }

  /**
   * Serialize and atomically replace the services document
   * @throws ValidationError, ConflictError, FileAccessError, SerializationError
   */
  async save(filePath: string, document: ServicesDocument, options: SaveOptions = {}): Promise<void> {
    const resolved = this.policy.validate(filePath);
    const content = serializeServicesDocument(document);

    if (options.expectedDigest !== undefined) {
      const current = await hashFile(resolved);
      if (current !== options.expectedDigest) {
        throw new ConflictError(`Services file changed on disk since it was loaded: ${resolved}`, {
          path: resolved,
          expected: options.expectedDigest,
          actual: current,
        });
      }
    }

    const mode = await this.currentMode(resolved);
    const tempPath = path.join(
      path.dirname(resolved),
      `.${path.basename(resolved)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      if (mode !== undefined) {
        await fs.chmod(tempPath, mode);
      }
      await this.replace(tempPath, resolved);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new FileAccessError(`Failed to write ${resolved}: ${errorMessage(error)}`, {
        path: resolved,
        code: systemErrorCode(error),
      });
    }

    this.logger.info('Saved services file', {
      path: resolved,
      entries: document.containers.length,
      bytes: Buffer.byteLength(content),
    });
  }

  private async currentMode(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mode & 0o777;
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw new FileAccessError(`Failed to stat ${filePath}: ${errorMessage(error)}`, {
        path: filePath,
        code: systemErrorCode(error),
      });
    }
  }

  /**
   * Rename the temp file over the target. A target that is itself a mount
   * point (single-file bind mount) cannot be renamed over; it is rewritten
   * in place instead.
   */
  private async replace(tempPath: string, target: string): Promise<void> {
    try {
      await fs.rename(tempPath, target);
    } catch (error) {
      const code = systemErrorCode(error);
      if (code !== 'EBUSY' && code !== 'EXDEV') {
        throw error;
      }
      this.logger.warn('Atomic rename not possible, rewriting in place', { path: target, code });
      await fs.copyFile(tempPath, target);
      await fs.rm(tempPath, { force: true });
    }
  }
}
