import { z, ZodRawShape } from 'zod';
import type { WorkflowTool, ToolCallResult } from '../interfaces/tool.interface';
import type { ActionDispatcher } from '../services/action-dispatcher.service';
import { formatZodError } from '../utils/format-zod-error';
import { err, text } from './tool-results';

/**
 * Exposes one action as a tool. Arguments are validated against the action's
 * schema before dispatch and are passed through without template rendering.
 */
export class ActionTool implements WorkflowTool {
  readonly inputSchema: ZodRawShape;

  constructor(
    readonly name: string,
    readonly description: string,
    private readonly dispatcher: ActionDispatcher,
    inputSchema: ZodRawShape,
  ) {
    this.inputSchema = inputSchema;
  }

  async execute(args: Record<string, unknown>): Promise<ToolCallResult> {
    const parsed = z.object(this.inputSchema).safeParse(args);
    if (!parsed.success) {
      return err(
        `Invalid arguments for ${this.name}: ${formatZodError(parsed.error, 'input')}`,
      );
    }

    const result = await this.dispatcher.dispatch(this.name, {
      runId: 'tool',
      state: this.name,
      args: parsed.data,
      context: {},
      renderArgs: false,
    });

    switch (result.kind) {
      case 'success':
        return text(result.message ?? `${this.name} succeeded`);
      case 'recoverable':
      case 'fatal':
      case 'abort':
        return err(result.message);
    }
  }
}
