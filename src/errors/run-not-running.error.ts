import type { WorkflowRunStatus } from '../interfaces/workflow-run.interface';

export class RunNotRunningError extends Error {
  constructor(
    public readonly runId: string,
    public readonly status: WorkflowRunStatus,
  ) {
    super(`Workflow run ${runId} is ${status}; only running runs can be executed.`);
    this.name = 'RunNotRunningError';
  }
}
