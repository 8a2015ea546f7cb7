export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type RunContext = Record<string, JsonValue>;

export interface StateActionConfig {
  /** Name of a registered action handler. */
  name: string;
  /** Arguments passed to the handler. String values are rendered against the run context. */
  args?: Record<string, JsonValue>;
}

export interface StateDefinition {
  id: string;
  description?: string;
  action?: StateActionConfig;
  /** Entering this state completes the run. */
  terminal?: boolean;
  /** Entering this state pauses the run until it is resumed. */
  pause?: boolean;
}

export type ContextPredicate = (context: Readonly<RunContext>) => boolean;

export type TransitionCondition =
  | { type: 'always' }
  | { type: 'never' }
  | { type: 'on-success' }
  | { type: 'on-failure' }
  | { type: 'context-equals'; variable: string; value: JsonValue }
  | { type: 'custom'; description?: string; predicate: ContextPredicate };

export interface TransitionDefinition {
  from: string;
  to: string;
  condition: TransitionCondition;
}

export interface WorkflowDefinitionDraft {
  name: string;
  description?: string;
  initialState?: string;
  states: StateDefinition[];
  transitions: Array<
    Omit<TransitionDefinition, 'condition'> & {
      condition?: TransitionCondition;
    }
  >;
}
