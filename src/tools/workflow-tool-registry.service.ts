import { Inject, Injectable } from '@nestjs/common';
import type { IAbortSignal } from '../interfaces/abort-signal.interface';
import type { WorkflowTool } from '../interfaces/tool.interface';
import { ActionDispatcher } from '../services/action-dispatcher.service';
import { WorkflowExecutor } from '../services/workflow-executor.service';
import { ABORT_SIGNAL } from '../workflow.constants';
import { ActionTool } from './action.tool';
import {
  AbortCreateTool,
  WorkflowRunTool,
  WorkflowStatusTool,
} from './workflow.tools';

/** Actions that are also offered to agents as tools. */
export const ISSUE_TOOL_ACTIONS: readonly string[] = [
  'issue_create',
  'issue_update',
  'issue_mark_complete',
  'issue_all_complete',
  'issue_current',
  'issue_work',
  'issue_merge',
];

@Injectable()
export class WorkflowToolRegistry {
  constructor(
    private readonly dispatcher: ActionDispatcher,
    private readonly executor: WorkflowExecutor,
    @Inject(ABORT_SIGNAL) private readonly abortSignal: IAbortSignal,
  ) {}

  /**
   * Builds the tool list from the actions registered at call time, so call it
   * after the module has initialised.
   */
  getTools(): WorkflowTool[] {
    const tools: WorkflowTool[] = [];

    for (const name of ISSUE_TOOL_ACTIONS) {
      const handler = this.dispatcher.get(name);
      if (handler) {
        tools.push(
          new ActionTool(
            handler.name,
            handler.description,
            this.dispatcher,
            handler.argsSchema,
          ),
        );
      }
    }

    tools.push(
      new WorkflowRunTool(this.executor),
      new WorkflowStatusTool(this.executor),
      new AbortCreateTool(this.abortSignal),
    );
    return tools;
  }
}
