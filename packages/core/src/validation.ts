/**
 * Validation utilities
 */

import type { ZodError } from 'zod';

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
