import { WorkflowDefinition } from '../../src/models/workflow-definition';
import { WorkflowRun, isTerminalStatus } from '../../src/models/workflow-run';
import type { RunContext } from '../../src/interfaces/workflow-definition.interface';
import { UnknownStateError } from '../../src/errors/unknown-state.error';

const definition = WorkflowDefinition.builder('lifecycle')
  .addState({ id: 'start' }, { initial: true })
  .addState({ id: 'working' })
  .addState({ id: 'done', terminal: true })
  .addTransition('start', 'working')
  .addTransition('working', 'done')
  .build();

function expectHistoryInvariants(run: WorkflowRun): void {
  const { history } = run;
  expect(history.length).toBeGreaterThan(0);
  expect(history[0].state).toBe(run.workflow.initialState());
  expect(history[history.length - 1].state).toBe(run.currentState);
  for (let i = 1; i < history.length; i++) {
    expect(history[i].timestamp.getTime()).toBeGreaterThanOrEqual(
      history[i - 1].timestamp.getTime(),
    );
  }
}

describe('WorkflowRun', () => {
  it('should start running at the initial state with a seeded history', () => {
    const now = new Date('2024-01-01T00:00:00.000Z');
    const run = WorkflowRun.create(definition, now);

    expect(run.status).toBe('running');
    expect(run.currentState).toBe('start');
    expect(run.startedAt).toEqual(now);
    expect(run.completedAt).toBeNull();
    expect(run.context).toEqual({});
    expect(run.history).toEqual([{ state: 'start', timestamp: now }]);
    expectHistoryInvariants(run);
  });

  it('should append to history on every transition', () => {
    const run = WorkflowRun.create(definition, new Date(1000));

    run.transitionTo('working', new Date(2000));
    run.transitionTo('done', new Date(3000));

    expect(run.history.map((entry) => entry.state)).toEqual([
      'start',
      'working',
      'done',
    ]);
    expect(run.currentState).toBe('done');
    expectHistoryInvariants(run);
  });

  it('should keep history entries made within the same millisecond in call order', () => {
    const instant = new Date(5000);
    const run = WorkflowRun.create(definition, instant);

    run.transitionTo('working', instant);
    run.transitionTo('start', instant);
    run.transitionTo('working', instant);

    expect(run.history.map((entry) => entry.state)).toEqual([
      'start',
      'working',
      'start',
      'working',
    ]);
    expectHistoryInvariants(run);
  });

  it('should clamp a clock that steps backwards to the previous timestamp', () => {
    const run = WorkflowRun.create(definition, new Date(10_000));

    run.transitionTo('working', new Date(9_000));

    expect(run.history[1].timestamp.getTime()).toBe(10_000);
    expectHistoryInvariants(run);
  });

  it('should reject transitions to undeclared states without touching history', () => {
    const run = WorkflowRun.create(definition);

    expect(() => run.transitionTo('missing')).toThrow(UnknownStateError);
    expect(run.history).toHaveLength(1);
    expect(run.currentState).toBe('start');
  });

  it.each([
    ['complete', 'completed'],
    ['fail', 'failed'],
    ['cancel', 'cancelled'],
  ] as const)('should set completedAt when %s is called', (method, status) => {
    const run = WorkflowRun.create(definition, new Date(1000));
    const finishedAt = new Date(2000);

    run[method](finishedAt);

    expect(run.status).toBe(status);
    expect(run.completedAt).toEqual(finishedAt);
    expect(isTerminalStatus(run.status)).toBe(true);
  });

  it('should keep the first completedAt on a second terminal call', () => {
    const run = WorkflowRun.create(definition);

    run.fail(new Date(1000));
    run.cancel(new Date(2000));

    expect(run.status).toBe('cancelled');
    expect(run.completedAt).toEqual(new Date(1000));
  });

  it('should pause without a completion timestamp and resume to running', () => {
    const run = WorkflowRun.create(definition);

    run.pause(new Date('2024-02-02T10:00:00.000Z'));
    expect(run.status).toBe('paused');
    expect(run.completedAt).toBeNull();
    expect(run.metadata).toEqual({ paused_at: '2024-02-02T10:00:00.000Z' });

    run.resume();
    expect(run.status).toBe('running');
    expect(run.metadata).toEqual({});
  });

  it('should merge context updates, overwriting existing keys', () => {
    const run = WorkflowRun.create(definition);

    run.mergeContext({ a: 1, b: 'two' });
    run.mergeContext({ b: 'three', c: [true, null] });

    expect(run.context).toEqual({ a: 1, b: 'three', c: [true, null] });
  });

  it('should keep a __proto__ update as a plain variable', () => {
    const run = WorkflowRun.create(definition);
    const updates: RunContext = JSON.parse('{"__proto__":{"polluted":true}}');

    run.mergeContext(updates);

    const context = run.context;
    expect(Object.getPrototypeOf(context)).toBe(Object.prototype);
    expect(Object.keys(context)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(context, '__proto__')?.value).toEqual({
      polluted: true,
    });
    expect('polluted' in context).toBe(false);
  });

  it('should produce a detached record', () => {
    const run = WorkflowRun.create(definition, new Date(1000));
    run.mergeContext({ nested: { value: 1 } });
    run.setMetadata('note', 'hello');

    const record = run.toRecord();
    run.mergeContext({ nested: { value: 2 } });

    expect(record).toEqual({
      id: run.id.toString(),
      workflowName: 'lifecycle',
      currentState: 'start',
      status: 'running',
      context: { nested: { value: 1 } },
      metadata: { note: 'hello' },
      startedAt: new Date(1000),
      completedAt: null,
    });
  });

  it('should give each run its own id while sharing the definition', () => {
    const first = WorkflowRun.create(definition);
    const second = WorkflowRun.create(definition);

    expect(first.workflow).toBe(second.workflow);
    expect(first.id.compareTo(second.id)).toBe(-1);
  });
});
