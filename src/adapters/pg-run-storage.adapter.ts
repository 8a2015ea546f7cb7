import type { Pool } from 'pg';
import type { RunContext } from '../interfaces/workflow-definition.interface';
import type { IRunStorageAdapter } from '../interfaces/run-storage-adapter.interface';
import type {
  RunHistoryRecord,
  RunRecord,
  WorkflowRunStatus,
} from '../interfaces/workflow-run.interface';
import { validateTableName } from '../utils/validate-table-name';

interface PgRunRow {
  id: string;
  workflow_name: string;
  current_state: string;
  status: WorkflowRunStatus;
  context: unknown;
  metadata: unknown;
  started_at: Date | string;
  completed_at: Date | string | null;
}

interface PgHistoryRow {
  run_id: string;
  sequence: number;
  state: string;
  entered_at: Date | string;
}

function parseJsonColumn<T>(value: unknown): T {
  return (typeof value === 'string' ? JSON.parse(value) : value) as T;
}

/**
 * Run history in PostgreSQL. Tables are created by the SQL from
 * `generateMigration(tableName)`.
 */
export class PgRunStorageAdapter implements IRunStorageAdapter {
  private readonly historyTable: string;

  constructor(
    private readonly pool: Pick<Pool, 'query'>,
    private readonly tableName = 'workflow_runs',
  ) {
    validateTableName(tableName);
    this.historyTable = `${tableName}_history`;
    validateTableName(this.historyTable);
  }

  async saveRun(record: RunRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.tableName}
       (id, workflow_name, current_state, status, context, metadata, started_at, completed_at, updated_at)
       VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7, $8, CURRENT_TIMESTAMP)
       ON CONFLICT (id) DO UPDATE SET
         current_state = $3,
         status = $4,
         context = $5::jsonb,
         metadata = $6::jsonb,
         completed_at = $8,
         updated_at = CURRENT_TIMESTAMP`,
      [
        record.id,
        record.workflowName,
        record.currentState,
        record.status,
        JSON.stringify(record.context),
        JSON.stringify(record.metadata),
        record.startedAt,
        record.completedAt,
      ],
    );
  }

  async appendHistory(entry: RunHistoryRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.historyTable} (run_id, sequence, state, entered_at)
       VALUES ($1, $2, $3, $4)`,
      [entry.runId, entry.sequence, entry.state, entry.enteredAt],
    );
  }

  async findRun(id: string): Promise<RunRecord | null> {
    const result = await this.pool.query<PgRunRow>(
      `SELECT id, workflow_name, current_state, status, context, metadata, started_at, completed_at
       FROM ${this.tableName}
       WHERE id = $1`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return this.toRunRecord(result.rows[0]);
  }

  async findByStatus(status: WorkflowRunStatus): Promise<RunRecord[]> {
    const result = await this.pool.query<PgRunRow>(
      `SELECT id, workflow_name, current_state, status, context, metadata, started_at, completed_at
       FROM ${this.tableName}
       WHERE status = $1
       ORDER BY id`,
      [status],
    );

    return result.rows.map((row) => this.toRunRecord(row));
  }

  async listHistory(runId: string): Promise<RunHistoryRecord[]> {
    const result = await this.pool.query<PgHistoryRow>(
      `SELECT run_id, sequence, state, entered_at
       FROM ${this.historyTable}
       WHERE run_id = $1
       ORDER BY sequence`,
      [runId],
    );

    return result.rows.map((row) => ({
      runId: row.run_id,
      sequence: Number(row.sequence),
      state: row.state,
      enteredAt: new Date(row.entered_at),
    }));
  }

  private toRunRecord(row: PgRunRow): RunRecord {
    return {
      id: row.id,
      workflowName: row.workflow_name,
      currentState: row.current_state,
      status: row.status,
      context: parseJsonColumn<RunContext>(row.context),
      metadata: parseJsonColumn<Record<string, string>>(row.metadata),
      startedAt: new Date(row.started_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
    };
  }
}
