export class GitOperationError extends Error {
  constructor(
    public readonly operation: string,
    public readonly detail: string,
  ) {
    super(`Git operation '${operation}' failed: ${detail}`);
    this.name = 'GitOperationError';
  }
}
