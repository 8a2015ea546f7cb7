import type {
  RunHistoryRecord,
  RunRecord,
  WorkflowRunStatus,
} from './workflow-run.interface';

export interface IRunStorageAdapter {
  /**
   * Insert or update the live run row.
   */
  saveRun(record: RunRecord): Promise<void>;

  /**
   * Append one entry to the run's history log.
   */
  appendHistory(entry: RunHistoryRecord): Promise<void>;

  findRun(id: string): Promise<RunRecord | null>;

  /**
   * Find all runs with the given status.
   * Enables consumer-driven cleanup of finished runs.
   */
  findByStatus(status: WorkflowRunStatus): Promise<RunRecord[]>;

  /**
   * History of a run ordered by sequence.
   */
  listHistory(runId: string): Promise<RunHistoryRecord[]>;
}
