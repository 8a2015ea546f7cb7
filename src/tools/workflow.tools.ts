import { z } from 'zod';
import { InvalidRunIdError } from '../errors/invalid-run-id.error';
import { WorkflowNotRegisteredError } from '../errors/workflow-not-registered.error';
import type { IAbortSignal } from '../interfaces/abort-signal.interface';
import type { ToolCallResult, WorkflowTool } from '../interfaces/tool.interface';
import { jsonValueSchema } from '../utils/json-value.schema';
import { WorkflowExecutor } from '../services/workflow-executor.service';
import { errorMessage } from '../utils/error-utils';
import { formatZodError } from '../utils/format-zod-error';
import { err, ok, text } from './tool-results';

const workflowRunArgs = z.object({
  workflow: z.string().min(1).describe('Name of a registered workflow'),
  context: z
    .record(jsonValueSchema)
    .optional()
    .describe('Initial context variables'),
});

const workflowStatusArgs = z.object({
  run_id: z.string().min(1).describe('Run id returned by workflow_run'),
});

const abortCreateArgs = z.object({
  reason: z.string().min(1).describe('Why the running workflow should stop'),
});

export class WorkflowRunTool implements WorkflowTool {
  readonly name = 'workflow_run';
  readonly description =
    'Run a registered workflow until it completes, fails, is cancelled or pauses';
  readonly inputSchema = workflowRunArgs.shape;

  constructor(private readonly executor: WorkflowExecutor) {}

  async execute(args: Record<string, unknown>): Promise<ToolCallResult> {
    const parsed = workflowRunArgs.safeParse(args);
    if (!parsed.success) {
      return err(
        `Invalid arguments for ${this.name}: ${formatZodError(parsed.error, 'input')}`,
      );
    }

    try {
      const run = await this.executor.run(
        parsed.data.workflow,
        parsed.data.context ?? {},
      );
      return ok(WorkflowExecutor.summarize(run));
    } catch (error) {
      if (error instanceof WorkflowNotRegisteredError) {
        return err(error.message);
      }
      throw error;
    }
  }
}

export class WorkflowStatusTool implements WorkflowTool {
  readonly name = 'workflow_status';
  readonly description = 'Report the status and history of a workflow run';
  readonly inputSchema = workflowStatusArgs.shape;

  constructor(private readonly executor: WorkflowExecutor) {}

  async execute(args: Record<string, unknown>): Promise<ToolCallResult> {
    const parsed = workflowStatusArgs.safeParse(args);
    if (!parsed.success) {
      return err(
        `Invalid arguments for ${this.name}: ${formatZodError(parsed.error, 'input')}`,
      );
    }

    try {
      const summary = await this.executor.describeRun(parsed.data.run_id);
      return summary
        ? ok(summary)
        : err(`Workflow run '${parsed.data.run_id}' not found`);
    } catch (error) {
      if (error instanceof InvalidRunIdError) {
        return err(error.message);
      }
      throw error;
    }
  }
}

export class AbortCreateTool implements WorkflowTool {
  readonly name = 'abort_create';
  readonly description =
    'Request cancellation of the running workflow; it stops at its next poll point';
  readonly inputSchema = abortCreateArgs.shape;

  constructor(private readonly abortSignal: IAbortSignal) {}

  async execute(args: Record<string, unknown>): Promise<ToolCallResult> {
    const parsed = abortCreateArgs.safeParse(args);
    if (!parsed.success) {
      return err(
        `Invalid arguments for ${this.name}: ${formatZodError(parsed.error, 'input')}`,
      );
    }

    try {
      await this.abortSignal.raise(parsed.data.reason);
      return text(`Abort requested: ${parsed.data.reason}`);
    } catch (error) {
      return err(`Failed to create abort signal: ${errorMessage(error)}`);
    }
  }
}
