export class InvalidRunIdError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid workflow run ID '${input}'`);
    this.name = 'InvalidRunIdError';
  }
}
