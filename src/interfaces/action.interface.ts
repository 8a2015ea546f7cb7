import type { ZodRawShape } from 'zod';
import type { IAbortSignal } from './abort-signal.interface';
import type {
  JsonValue,
  RunContext,
} from './workflow-definition.interface';

export type ActionResult =
  | { kind: 'success'; contextUpdates: RunContext; message?: string }
  | { kind: 'recoverable'; message: string }
  | { kind: 'fatal'; message: string; reason: string }
  | { kind: 'abort'; message: string; reason: string };

export interface ActionInput {
  runId: string;
  state: string;
  args: Record<string, JsonValue>;
  context: Readonly<RunContext>;
  abortSignal: IAbortSignal;
}

export interface DispatchInput extends Omit<ActionInput, 'abortSignal'> {
  /** Render string arguments through the template renderer. Default: true */
  renderArgs?: boolean;
}

export interface WorkflowActionHandler {
  readonly name: string;
  readonly description: string;
  /** Shape of the accepted arguments; also the input schema of the matching tool. */
  readonly argsSchema: ZodRawShape;
  execute(input: ActionInput): Promise<ActionResult>;
}
