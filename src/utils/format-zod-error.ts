import type { ZodError } from 'zod';

/** "path: message" per issue, joined with "; ". Root issues are labelled `rootLabel` when given. */
export function formatZodError(error: ZodError, rootLabel?: string): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.join('.') || rootLabel;
      return location ? `${location}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
