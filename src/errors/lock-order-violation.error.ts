export class LockOrderViolationError extends Error {
  constructor(
    public readonly requested: string,
    public readonly held: string,
  ) {
    super(
      requested === held
        ? `Guard "${requested}" is already held by this operation.`
        : `Cannot acquire guard "${requested}" while holding "${held}". Release it first.`,
    );
    this.name = 'LockOrderViolationError';
  }
}
