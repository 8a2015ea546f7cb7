import type { ActionResult } from '../interfaces/action.interface';
import type { RunContext } from '../interfaces/workflow-definition.interface';

export function success(
  contextUpdates: RunContext = {},
  message?: string,
): ActionResult {
  return message === undefined
    ? { kind: 'success', contextUpdates }
    : { kind: 'success', contextUpdates, message };
}

export function recoverable(message: string): ActionResult {
  return { kind: 'recoverable', message };
}

export function fatal(message: string, reason: string): ActionResult {
  return { kind: 'fatal', message, reason };
}

export function abort(message: string, reason: string): ActionResult {
  return { kind: 'abort', message, reason };
}
