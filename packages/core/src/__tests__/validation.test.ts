import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { formatIssues } from '../validation';

describe('formatIssues', () => {
  test('prefixes nested issues with their path', () => {
    const result = z.object({ containers: z.array(z.object({ name: z.string() })) }).safeParse({
      containers: [{ name: 'web1' }, {}],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['containers.1.name: Required']);
    }
  });

  test('omits the path prefix for root issues', () => {
    const result = z.string().safeParse(42);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['Expected string, received number']);
    }
  });
});
