import { UnknownStateError } from '../errors/unknown-state.error';
import type { RunContext } from '../interfaces/workflow-definition.interface';
import type {
  RunHistoryEntry,
  RunRecord,
  WorkflowRunStatus,
} from '../interfaces/workflow-run.interface';
import type { WorkflowDefinition } from './workflow-definition';
import { WorkflowRunId } from './workflow-run-id';

export const TERMINAL_RUN_STATUSES: ReadonlySet<WorkflowRunStatus> = new Set([
  'completed',
  'failed',
  'cancelled',
]);

export function isTerminalStatus(status: WorkflowRunStatus): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}

/**
 * One execution of a workflow definition.
 *
 * A run is a plain data object owned by whichever executor call drives it.
 * It keeps its own invariants (history is never empty and ends at the current
 * state, timestamps never go backwards) but does not guard status changes:
 * callers check `status` before transitioning.
 */
export class WorkflowRun {
  readonly id: WorkflowRunId;
  readonly startedAt: Date;

  private state: string;
  private runStatus: WorkflowRunStatus = 'running';
  private finishedAt: Date | null = null;
  private readonly entries: RunHistoryEntry[];
  private readonly variables: RunContext = {};
  private readonly meta: Record<string, string> = {};

  private constructor(
    readonly workflow: WorkflowDefinition,
    now: Date,
  ) {
    this.id = WorkflowRunId.create();
    this.startedAt = now;
    this.state = workflow.initialState();
    this.entries = [{ state: this.state, timestamp: now }];
  }

  static create(workflow: WorkflowDefinition, now = new Date()): WorkflowRun {
    return new WorkflowRun(workflow, now);
  }

  get currentState(): string {
    return this.state;
  }

  get status(): WorkflowRunStatus {
    return this.runStatus;
  }

  /** Set once the run reaches a terminal status; never cleared afterwards. */
  get completedAt(): Date | null {
    return this.finishedAt;
  }

  get history(): readonly RunHistoryEntry[] {
    return this.entries;
  }

  get context(): Readonly<RunContext> {
    return this.variables;
  }

  get metadata(): Readonly<Record<string, string>> {
    return this.meta;
  }

  transitionTo(stateId: string, now = new Date()): void {
    if (!this.workflow.hasState(stateId)) {
      throw new UnknownStateError(this.workflow.name, stateId);
    }

    const previous = this.entries[this.entries.length - 1];
    const timestamp =
      now.getTime() < previous.timestamp.getTime()
        ? new Date(previous.timestamp)
        : now;

    this.entries.push({ state: stateId, timestamp });
    this.state = stateId;
  }

  /** Keys are defined as own data properties, so `__proto__` stays an ordinary variable. */
  mergeContext(updates: RunContext): void {
    for (const [key, value] of Object.entries(updates)) {
      Object.defineProperty(this.variables, key, {
        value,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
  }

  setMetadata(key: string, value: string): void {
    this.meta[key] = value;
  }

  complete(now = new Date()): void {
    this.finish('completed', now);
  }

  fail(now = new Date()): void {
    this.finish('failed', now);
  }

  cancel(now = new Date()): void {
    this.finish('cancelled', now);
  }

  pause(now = new Date()): void {
    this.runStatus = 'paused';
    this.meta.paused_at = now.toISOString();
  }

  resume(): void {
    this.runStatus = 'running';
    delete this.meta.paused_at;
  }

  toRecord(): RunRecord {
    return {
      id: this.id.toString(),
      workflowName: this.workflow.name,
      currentState: this.state,
      status: this.runStatus,
      context: structuredClone(this.variables),
      metadata: { ...this.meta },
      startedAt: new Date(this.startedAt),
      completedAt: this.finishedAt ? new Date(this.finishedAt) : null,
    };
  }

  private finish(status: WorkflowRunStatus, now: Date): void {
    this.runStatus = status;
    if (!this.finishedAt) {
      this.finishedAt = now;
    }
  }
}
