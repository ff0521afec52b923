import * as path from 'path';
import { ValidationError } from '@dockwatch/core';

export interface PathPolicyConfig {
  /** Directory the services file must live in */
  baseDir: string;
  /** Further directories accepted in addition to `baseDir` (test fixtures, alternate mounts) */
  additionalPrefixes?: string[];
}

function isWithin(dir: string, candidate: string): boolean {
  const relative = path.relative(dir, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Restricts services file access to a set of directories
 */
export class PathPolicy {
  private readonly allowedDirs: string[];

  constructor(config: PathPolicyConfig) {
    const dirs = [config.baseDir, ...(config.additionalPrefixes ?? [])];
    for (const dir of dirs) {
      if (!path.isAbsolute(dir)) {
        throw new ValidationError(`Allowed directory must be absolute: ${dir}`, { dir });
      }
    }
    this.allowedDirs = dirs.map(dir => path.resolve(dir));
  }

  /**
   * Return the normalized path, or throw ValidationError when it is relative
   * or resolves outside every allowed directory
   */
  validate(filePath: string): string {
    if (!path.isAbsolute(filePath)) {
      throw new ValidationError(`Services file path must be absolute: ${filePath}`, { path: filePath });
    }

    const resolved = path.resolve(filePath);
    if (!this.allowedDirs.some(dir => isWithin(dir, resolved))) {
      throw new ValidationError(`Services file path is outside the allowed directories: ${filePath}`, {
        path: filePath,
        allowed: this.allowedDirs,
      });
    }
    return resolved;
  }
}
