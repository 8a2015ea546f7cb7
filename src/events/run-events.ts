import type { WorkflowRunStatus } from '../interfaces/workflow-run.interface';

export interface RunCreatedEvent {
  workflowName: string;
  runId: string;
  initialState: string;
  timestamp: Date;
}

export interface RunTransitionEvent {
  workflowName: string;
  runId: string;
  fromState: string;
  toState: string;
  /** Position of the new history entry. */
  sequence: number;
  timestamp: Date;
}

export interface RunFinishedEvent {
  workflowName: string;
  runId: string;
  status: WorkflowRunStatus;
  state: string;
  message: string;
  timestamp: Date;
}

export interface RunActionFailedEvent {
  workflowName: string;
  runId: string;
  state: string;
  action: string;
  kind: 'recoverable' | 'fatal' | 'abort';
  message: string;
  timestamp: Date;
}
