import { InvalidIssueNameError } from '../errors/issue.errors';
import { MAX_ISSUE_NAME_LENGTH } from '../workflow.constants';

const FORBIDDEN_CHARACTERS = /[/\\:*?"<>|]/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/**
 * Trims and validates an issue name. Names end up in file names and branch
 * names, so path separators and characters git or the filesystem reject are
 * not allowed.
 */
export function validateIssueName(name: string): string {
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new InvalidIssueNameError(name, 'name cannot be empty');
  }
  if (trimmed.length > MAX_ISSUE_NAME_LENGTH) {
    throw new InvalidIssueNameError(
      name,
      `name cannot exceed ${MAX_ISSUE_NAME_LENGTH} characters`,
    );
  }
  if (CONTROL_CHARACTERS.test(trimmed)) {
    throw new InvalidIssueNameError(name, 'name contains control characters');
  }
  if (FORBIDDEN_CHARACTERS.test(trimmed) || trimmed.startsWith('.')) {
    throw new InvalidIssueNameError(
      name,
      'name contains characters not allowed in file or branch names',
    );
  }

  return trimmed;
}
