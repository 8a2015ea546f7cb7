import type { RunContext } from './workflow-definition.interface';

export type WorkflowRunStatus =
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'paused';

export interface RunHistoryEntry {
  state: string;
  timestamp: Date;
}

export interface RunRecord {
  id: string;
  workflowName: string;
  currentState: string;
  status: WorkflowRunStatus;
  context: RunContext;
  metadata: Record<string, string>;
  startedAt: Date;
  completedAt: Date | null;
}

export interface RunHistoryRecord {
  runId: string;
  /** Position in the run history, starting at 0 for the initial state. */
  sequence: number;
  state: string;
  enteredAt: Date;
}

export interface RunSummary {
  id: string;
  workflow: string;
  status: WorkflowRunStatus;
  currentState: string;
  history: string[];
  lastMessage: string | null;
}
