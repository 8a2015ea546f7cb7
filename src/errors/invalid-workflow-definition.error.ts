export class InvalidWorkflowDefinitionError extends Error {
  constructor(
    public readonly workflowName: string,
    message: string,
  ) {
    super(`Workflow definition ${workflowName || '<unnamed>'}: ${message}`);
    this.name = 'InvalidWorkflowDefinitionError';
  }
}
