export class UnknownStateError extends Error {
  constructor(
    public readonly workflowName: string,
    public readonly stateId: string,
  ) {
    super(`Workflow ${workflowName} has no state "${stateId}".`);
    this.name = 'UnknownStateError';
  }
}
