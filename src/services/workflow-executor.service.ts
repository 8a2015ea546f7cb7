import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { success } from '../actions/action-results';
import { RunNotPausedError } from '../errors/run-not-paused.error';
import { RunNotRunningError } from '../errors/run-not-running.error';
import { TransitionLimitExceededError } from '../errors/transition-limit-exceeded.error';
import { RunEventType } from '../events/run-event-type.enum';
import type {
  RunActionFailedEvent,
  RunCreatedEvent,
  RunFinishedEvent,
  RunTransitionEvent,
} from '../events/run-events';
import type { IAbortSignal } from '../interfaces/abort-signal.interface';
import type { ActionResult } from '../interfaces/action.interface';
import type { IRunStorageAdapter } from '../interfaces/run-storage-adapter.interface';
import type { RunContext } from '../interfaces/workflow-definition.interface';
import type { ResolvedWorkflowOptions } from '../interfaces/workflow-module-options.interface';
import type {
  RunSummary,
  WorkflowRunStatus,
} from '../interfaces/workflow-run.interface';
import { WorkflowDefinition } from '../models/workflow-definition';
import { isTerminalStatus, WorkflowRun } from '../models/workflow-run';
import { WorkflowRunId } from '../models/workflow-run-id';
import { errorMessage } from '../utils/error-utils';
import { resolveNextTransition } from '../utils/evaluate-condition';
import {
  ABORT_SIGNAL,
  AGENT_WORKFLOW_OPTIONS,
  LAST_ERROR_VARIABLE,
  RUN_STORAGE_ADAPTER,
  SUCCESS_VARIABLE,
} from '../workflow.constants';
import { ActionDispatcher } from './action-dispatcher.service';
import { WorkflowRegistry } from './workflow-registry.service';

type FinalStatus = Extract<WorkflowRunStatus, 'completed' | 'failed' | 'cancelled'>;

/** Metadata keys written by the executor. */
export const RUN_METADATA = {
  LAST_MESSAGE: 'last_message',
  FAILURE_REASON: 'failure_reason',
  RECOVERABLE_FAILURES: 'recoverable_failures',
} as const;

/**
 * Drives runs through their workflow definition. Each `execute` call owns the
 * run it is given; concurrent calls must use different runs.
 */
@Injectable()
export class WorkflowExecutor {
  private readonly logger = new Logger(WorkflowExecutor.name);

  constructor(
    private readonly registry: WorkflowRegistry,
    private readonly dispatcher: ActionDispatcher,
    @Inject(ABORT_SIGNAL) private readonly abortSignal: IAbortSignal,
    @Inject(RUN_STORAGE_ADAPTER) private readonly storage: IRunStorageAdapter,
    private readonly eventEmitter: EventEmitter2,
    @Inject(AGENT_WORKFLOW_OPTIONS)
    private readonly options: ResolvedWorkflowOptions,
  ) {}

  /**
   * Creates and persists a new run. A stale abort marker from an earlier run
   * is cleared first; failing to clear it is logged and does not stop the
   * run from starting.
   */
  async startRun(
    workflow: string | WorkflowDefinition,
    context: RunContext = {},
  ): Promise<WorkflowRun> {
    const definition =
      workflow instanceof WorkflowDefinition
        ? workflow
        : this.registry.getOrThrow(workflow).definition;

    try {
      await this.abortSignal.clear();
    } catch (error) {
      this.logger.warn(`Failed to clear abort signal: ${errorMessage(error)}`);
    }

    const run = WorkflowRun.create(definition);
    run.mergeContext(context);

    await this.storage.saveRun(run.toRecord());
    await this.persistLatestHistory(run);

    this.eventEmitter.emit(RunEventType.CREATED, {
      workflowName: definition.name,
      runId: run.id.toString(),
      initialState: run.currentState,
      timestamp: run.startedAt,
    } satisfies RunCreatedEvent);

    this.logger.log(
      `Started run ${run.id.toString()} of workflow ${definition.name} at ${run.currentState}`,
    );
    return run;
  }

  /**
   * Runs until the run completes, fails, is cancelled or pauses. Errors
   * raised by the loop itself fail the run; errors persisting that failure
   * propagate.
   */
  async execute(run: WorkflowRun): Promise<WorkflowRun> {
    if (run.status !== 'running') {
      throw new RunNotRunningError(run.id.toString(), run.status);
    }

    try {
      await this.drive(run);
    } catch (error) {
      if (isTerminalStatus(run.status)) {
        throw error;
      }
      this.logger.error(
        `Run ${run.id.toString()} failed in state ${run.currentState}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      await this.finish(run, 'failed', errorMessage(error), 'executor-error');
    }

    return run;
  }

  async resume(run: WorkflowRun): Promise<WorkflowRun> {
    if (run.status !== 'paused') {
      throw new RunNotPausedError(run.id.toString(), run.status);
    }
    run.resume();
    await this.storage.saveRun(run.toRecord());
    this.logger.log(`Resumed run ${run.id.toString()} at ${run.currentState}`);
    return this.execute(run);
  }

  async run(
    workflow: string | WorkflowDefinition,
    context: RunContext = {},
  ): Promise<WorkflowRun> {
    return this.execute(await this.startRun(workflow, context));
  }

  /** Summary of a stored run, or null when the id is unknown. */
  async describeRun(id: string): Promise<RunSummary | null> {
    const runId = WorkflowRunId.parse(id).toString();
    const record = await this.storage.findRun(runId);
    if (!record) return null;

    const history = await this.storage.listHistory(runId);
    return {
      id: record.id,
      workflow: record.workflowName,
      status: record.status,
      currentState: record.currentState,
      history: history.map((entry) => entry.state),
      lastMessage: record.metadata[RUN_METADATA.LAST_MESSAGE] ?? null,
    };
  }

  static summarize(run: WorkflowRun): RunSummary {
    return {
      id: run.id.toString(),
      workflow: run.workflow.name,
      status: run.status,
      currentState: run.currentState,
      history: run.history.map((entry) => entry.state),
      lastMessage: run.metadata[RUN_METADATA.LAST_MESSAGE] ?? null,
    };
  }

  private async drive(run: WorkflowRun): Promise<void> {
    const definition = run.workflow;
    let transitions = 0;

    for (;;) {
      if (await this.cancelIfAborted(run)) return;

      const state = definition.getState(run.currentState);
      if (state.terminal) {
        await this.finish(run, 'completed', `Workflow completed in state '${state.id}'`);
        return;
      }

      const result: ActionResult = state.action
        ? await this.dispatcher.dispatch(state.action.name, {
            runId: run.id.toString(),
            state: state.id,
            args: state.action.args ?? {},
            context: run.context,
          })
        : success();

      if (await this.cancelIfAborted(run)) return;

      switch (result.kind) {
        case 'success':
          run.mergeContext({ ...result.contextUpdates, [SUCCESS_VARIABLE]: true });
          if (result.message !== undefined) {
            run.setMetadata(RUN_METADATA.LAST_MESSAGE, result.message);
          }
          break;
        case 'recoverable':
          this.recordRecoverable(run, state.action?.name ?? '', result.message);
          break;
        case 'fatal':
          this.emitActionFailed(run, state.action?.name ?? '', result);
          await this.finish(run, 'failed', result.message, result.reason);
          return;
        case 'abort':
          this.emitActionFailed(run, state.action?.name ?? '', result);
          await this.finish(run, 'cancelled', result.message, result.reason);
          return;
      }

      if (transitions >= this.options.maxTransitions) {
        const error = new TransitionLimitExceededError(
          run.id.toString(),
          this.options.maxTransitions,
        );
        await this.finish(run, 'failed', error.message, 'transition-limit');
        return;
      }

      const next = resolveNextTransition(definition, state.id, run.context);
      if (!next) {
        await this.finish(
          run,
          'failed',
          `no applicable transition from '${state.id}'`,
          'no-transition',
        );
        return;
      }

      run.transitionTo(next.to);
      transitions++;
      await this.persistLatestHistory(run);
      await this.storage.saveRun(run.toRecord());

      this.eventEmitter.emit(RunEventType.TRANSITION, {
        workflowName: definition.name,
        runId: run.id.toString(),
        fromState: state.id,
        toState: next.to,
        sequence: run.history.length - 1,
        timestamp: run.history[run.history.length - 1].timestamp,
      } satisfies RunTransitionEvent);

      const target = definition.getState(next.to);
      if (target.terminal) {
        await this.finish(run, 'completed', `Workflow completed in state '${target.id}'`);
        return;
      }
      if (target.pause) {
        run.pause();
        run.setMetadata(
          RUN_METADATA.LAST_MESSAGE,
          `Workflow paused in state '${target.id}'`,
        );
        await this.storage.saveRun(run.toRecord());
        this.logger.log(`Run ${run.id.toString()} paused at ${target.id}`);
        return;
      }
    }
  }

  private async cancelIfAborted(run: WorkflowRun): Promise<boolean> {
    const reason = await this.abortSignal.isRaised();
    if (reason === null) {
      return false;
    }
    await this.finish(run, 'cancelled', `Workflow aborted: ${reason}`, 'abort');
    return true;
  }

  private recordRecoverable(
    run: WorkflowRun,
    action: string,
    message: string,
  ): void {
    const failures =
      Number(run.metadata[RUN_METADATA.RECOVERABLE_FAILURES] ?? '0') + 1;

    run.mergeContext({
      [SUCCESS_VARIABLE]: false,
      [LAST_ERROR_VARIABLE]: message,
    });
    run.setMetadata(RUN_METADATA.RECOVERABLE_FAILURES, String(failures));
    run.setMetadata(RUN_METADATA.LAST_MESSAGE, message);

    this.logger.warn(
      `Run ${run.id.toString()} action ${action} failed in state ${run.currentState}: ${message}`,
    );
    this.emitActionFailed(run, action, { kind: 'recoverable', message });
  }

  private emitActionFailed(
    run: WorkflowRun,
    action: string,
    result: Exclude<ActionResult, { kind: 'success' }>,
  ): void {
    this.eventEmitter.emit(RunEventType.ACTION_FAILED, {
      workflowName: run.workflow.name,
      runId: run.id.toString(),
      state: run.currentState,
      action,
      kind: result.kind,
      message: result.message,
      timestamp: new Date(),
    } satisfies RunActionFailedEvent);
  }

  private async finish(
    run: WorkflowRun,
    status: FinalStatus,
    message: string,
    reason?: string,
  ): Promise<void> {
    switch (status) {
      case 'completed':
        run.complete();
        break;
      case 'failed':
        run.fail();
        break;
      case 'cancelled':
        run.cancel();
        break;
    }
    run.setMetadata(RUN_METADATA.LAST_MESSAGE, message);
    if (reason !== undefined) {
      run.setMetadata(RUN_METADATA.FAILURE_REASON, reason);
    }

    await this.storage.saveRun(run.toRecord());

    this.eventEmitter.emit(RunEventType.FINISHED, {
      workflowName: run.workflow.name,
      runId: run.id.toString(),
      status,
      state: run.currentState,
      message,
      timestamp: run.completedAt ?? new Date(),
    } satisfies RunFinishedEvent);

    const line = `Run ${run.id.toString()} ${status} at ${run.currentState}: ${message}`;
    if (status === 'completed') {
      this.logger.log(line);
    } else {
      this.logger.warn(line);
    }
  }

  private async persistLatestHistory(run: WorkflowRun): Promise<void> {
    const sequence = run.history.length - 1;
    const entry = run.history[sequence];
    await this.storage.appendHistory({
      runId: run.id.toString(),
      sequence,
      state: entry.state,
      enteredAt: entry.timestamp,
    });
  }
}
