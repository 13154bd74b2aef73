import type { ZodError } from 'zod';

/**
 * Flatten zod issues into a single "path: message" list
 */
export function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}
