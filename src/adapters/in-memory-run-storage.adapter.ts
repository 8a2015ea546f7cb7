import type { IRunStorageAdapter } from '../interfaces/run-storage-adapter.interface';
import type {
  RunHistoryRecord,
  RunRecord,
  WorkflowRunStatus,
} from '../interfaces/workflow-run.interface';

function cloneRunRecord(record: RunRecord): RunRecord {
  return {
    id: record.id,
    workflowName: record.workflowName,
    currentState: record.currentState,
    status: record.status,
    context: structuredClone(record.context),
    metadata: { ...record.metadata },
    startedAt: new Date(record.startedAt),
    completedAt: record.completedAt ? new Date(record.completedAt) : null,
  };
}

function cloneHistoryRecord(record: RunHistoryRecord): RunHistoryRecord {
  return {
    runId: record.runId,
    sequence: record.sequence,
    state: record.state,
    enteredAt: new Date(record.enteredAt),
  };
}

export class InMemoryRunStorageAdapter implements IRunStorageAdapter {
  private readonly runs = new Map<string, RunRecord>();
  private readonly historyByRun = new Map<string, RunHistoryRecord[]>();

  async saveRun(record: RunRecord): Promise<void> {
    this.runs.set(record.id, cloneRunRecord(record));
  }

  async appendHistory(entry: RunHistoryRecord): Promise<void> {
    const history = this.historyByRun.get(entry.runId) ?? [];
    if (history.some((existing) => existing.sequence === entry.sequence)) {
      throw new Error(
        `History entry ${entry.sequence} already recorded for run ${entry.runId}`,
      );
    }
    history.push(cloneHistoryRecord(entry));
    this.historyByRun.set(entry.runId, history);
  }

  async findRun(id: string): Promise<RunRecord | null> {
    const record = this.runs.get(id);
    return record ? cloneRunRecord(record) : null;
  }

  async findByStatus(status: WorkflowRunStatus): Promise<RunRecord[]> {
    const matches: RunRecord[] = [];
    for (const record of this.runs.values()) {
      if (record.status === status) {
        matches.push(cloneRunRecord(record));
      }
    }
    return matches.sort((a, b) => a.id.localeCompare(b.id));
  }

  async listHistory(runId: string): Promise<RunHistoryRecord[]> {
    return (this.historyByRun.get(runId) ?? [])
      .map(cloneHistoryRecord)
      .sort((a, b) => a.sequence - b.sequence);
  }
}
