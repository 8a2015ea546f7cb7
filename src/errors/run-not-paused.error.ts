import type { WorkflowRunStatus } from '../interfaces/workflow-run.interface';

export class RunNotPausedError extends Error {
  constructor(
    public readonly runId: string,
    public readonly status: WorkflowRunStatus,
  ) {
    super(`Workflow run ${runId} is ${status}; only paused runs can be resumed.`);
    this.name = 'RunNotPausedError';
  }
}
