import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { PgRunStorageAdapter } from '../../src/adapters/pg-run-storage.adapter';

function createQueryResult<T extends QueryResultRow>(rows: T[] = []): QueryResult<T> {
  return {
    rows,
    rowCount: rows.length,
    command: '',
    oid: 0,
    fields: [],
  };
}

function createMockPool() {
  const query = jest.fn<Promise<QueryResult<any>>, [string, unknown[]?]>();
  query.mockResolvedValue(createQueryResult([]));
  const pool = { query: query as any } as unknown as Pick<Pool, 'query'>;
  return { pool, query };
}

describe('PgRunStorageAdapter', () => {
  it('should reject invalid table names', () => {
    const { pool } = createMockPool();

    expect(() => new PgRunStorageAdapter(pool, 'runs; DROP TABLE')).toThrow(
      'Invalid table name "runs; DROP TABLE". Only alphanumeric characters and underscores are allowed.',
    );
  });

  it('should upsert runs with JSON encoded context and metadata', async () => {
    const { pool, query } = createMockPool();
    const adapter = new PgRunStorageAdapter(pool, 'agent_runs');
    const startedAt = new Date('2024-01-01T00:00:00.000Z');

    await adapter.saveRun({
      id: 'RUN1',
      workflowName: 'basic',
      currentState: 'start',
      status: 'running',
      context: { count: 1 },
      metadata: { note: 'x' },
      startedAt,
      completedAt: null,
    });

    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('INSERT INTO agent_runs');
    expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET');
    expect(params).toEqual([
      'RUN1',
      'basic',
      'start',
      'running',
      '{"count":1}',
      '{"note":"x"}',
      startedAt,
      null,
    ]);
  });

  it('should append history to the history table', async () => {
    const { pool, query } = createMockPool();
    const adapter = new PgRunStorageAdapter(pool, 'agent_runs');
    const enteredAt = new Date(1000);

    await adapter.appendHistory({ runId: 'RUN1', sequence: 2, state: 'done', enteredAt });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('INSERT INTO agent_runs_history (run_id, sequence, state, entered_at)');
    expect(params).toEqual(['RUN1', 2, 'done', enteredAt]);
  });

  it('should return null when the run is not found', async () => {
    const { pool } = createMockPool();
    const adapter = new PgRunStorageAdapter(pool);

    await expect(adapter.findRun('RUN1')).resolves.toBeNull();
  });

  it('should map rows into run records', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(
      createQueryResult([
        {
          id: 'RUN1',
          workflow_name: 'basic',
          current_state: 'done',
          status: 'completed',
          context: '{"count":2}',
          metadata: { last_message: 'ok' },
          started_at: '2024-01-01T00:00:00.000Z',
          completed_at: '2024-01-01T00:05:00.000Z',
        },
      ]),
    );
    const adapter = new PgRunStorageAdapter(pool);

    await expect(adapter.findRun('RUN1')).resolves.toEqual({
      id: 'RUN1',
      workflowName: 'basic',
      currentState: 'done',
      status: 'completed',
      context: { count: 2 },
      metadata: { last_message: 'ok' },
      startedAt: new Date('2024-01-01T00:00:00.000Z'),
      completedAt: new Date('2024-01-01T00:05:00.000Z'),
    });
    expect(query.mock.calls[0][0]).toContain('FROM workflow_runs');
    expect(query.mock.calls[0][1]).toEqual(['RUN1']);
  });

  it('should query runs by status', async () => {
    const { pool, query } = createMockPool();
    const adapter = new PgRunStorageAdapter(pool);

    await expect(adapter.findByStatus('paused')).resolves.toEqual([]);
    expect(query.mock.calls[0][0]).toContain('WHERE status = $1');
    expect(query.mock.calls[0][1]).toEqual(['paused']);
  });

  it('should map history rows', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(
      createQueryResult([
        { run_id: 'RUN1', sequence: '0', state: 'start', entered_at: '2024-01-01T00:00:00.000Z' },
        { run_id: 'RUN1', sequence: 1, state: 'done', entered_at: new Date(5000) },
      ]),
    );
    const adapter = new PgRunStorageAdapter(pool);

    await expect(adapter.listHistory('RUN1')).resolves.toEqual([
      {
        runId: 'RUN1',
        sequence: 0,
        state: 'start',
        enteredAt: new Date('2024-01-01T00:00:00.000Z'),
      },
      { runId: 'RUN1', sequence: 1, state: 'done', enteredAt: new Date(5000) },
    ]);
    expect(query.mock.calls[0][0]).toContain('FROM workflow_runs_history');
  });
});
