import {
  InvalidIssueNameError,
  IssueAlreadyExistsError,
  IssueNotFoundError,
} from '../errors/issue.errors';
import type { ActionResult } from '../interfaces/action.interface';
import { recoverable } from './action-results';

export const ISSUE_STORE_UNAVAILABLE = 'Issue storage not available';
export const GIT_UNAVAILABLE = 'Git operations not available';

/**
 * Business errors from the issue store become recoverable results. Anything
 * else is rethrown for the dispatcher to report as fatal.
 */
export function issueFailure(error: unknown, operation: string): ActionResult {
  if (
    error instanceof IssueNotFoundError ||
    error instanceof IssueAlreadyExistsError ||
    error instanceof InvalidIssueNameError
  ) {
    return recoverable(`Failed to ${operation}: ${error.message}`);
  }
  throw error;
}
