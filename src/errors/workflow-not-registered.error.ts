export class WorkflowNotRegisteredError extends Error {
  constructor(public readonly workflowName: string) {
    super(`No workflow registered under the name "${workflowName}".`);
    this.name = 'WorkflowNotRegisteredError';
  }
}
