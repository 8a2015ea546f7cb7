import { Injectable, Logger } from '@nestjs/common';
import { WorkflowActionProvider } from '../decorators/workflow-action-provider.decorator';
import type {
  ActionInput,
  ActionResult,
  WorkflowActionHandler,
} from '../interfaces/action.interface';
import { abort, success } from './action-results';
import { abortArgs, logArgs, setVariableArgs } from './action-schemas';

@Injectable()
@WorkflowActionProvider()
export class SetVariableAction implements WorkflowActionHandler {
  readonly name = 'set_variable';
  readonly description = 'Set a variable in the run context';
  readonly argsSchema = setVariableArgs.shape;

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name, value } = setVariableArgs.parse(input.args);
    return success({ [name]: value }, `Set ${name}`);
  }
}

@Injectable()
@WorkflowActionProvider()
export class LogAction implements WorkflowActionHandler {
  private readonly logger = new Logger(LogAction.name);

  readonly name = 'log';
  readonly description = 'Write a message to the application log';
  readonly argsSchema = logArgs.shape;

  async execute(input: ActionInput): Promise<ActionResult> {
    const { message, level = 'log' } = logArgs.parse(input.args);
    const line = `[${input.runId}] ${message}`;
    switch (level) {
      case 'debug':
        this.logger.debug(line);
        break;
      case 'warn':
        this.logger.warn(line);
        break;
      case 'error':
        this.logger.error(line);
        break;
      default:
        this.logger.log(line);
    }
    return success({}, message);
  }
}

/**
 * Raises the abort signal. The run is cancelled at the executor's next poll,
 * which follows this action immediately.
 */
@Injectable()
@WorkflowActionProvider()
export class AbortAction implements WorkflowActionHandler {
  readonly name = 'abort';
  readonly description = 'Abort the current run with a reason';
  readonly argsSchema = abortArgs.shape;

  async execute(input: ActionInput): Promise<ActionResult> {
    const { reason } = abortArgs.parse(input.args);
    await input.abortSignal.raise(reason);
    return abort(`Workflow aborted: ${reason}`, reason);
  }
}
