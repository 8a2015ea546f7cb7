import { InvalidWorkflowDefinitionError } from '../errors/invalid-workflow-definition.error';
import { UnknownStateError } from '../errors/unknown-state.error';
import type {
  StateDefinition,
  TransitionCondition,
  TransitionDefinition,
  WorkflowDefinitionDraft,
} from '../interfaces/workflow-definition.interface';
import { validateWorkflowDefinition } from '../utils/validate-workflow-definition';

const ALWAYS: TransitionCondition = Object.freeze({ type: 'always' });

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

// Copies are taken so that callers mutating their own objects after build()
// cannot change a definition shared by running workflows.
function freezeState(state: StateDefinition): StateDefinition {
  return Object.freeze({
    ...state,
    action: state.action
      ? Object.freeze({
          name: state.action.name,
          args: state.action.args
            ? deepFreeze(structuredClone(state.action.args))
            : undefined,
        })
      : undefined,
  });
}

function freezeCondition(condition: TransitionCondition): TransitionCondition {
  if (condition.type === 'context-equals') {
    return Object.freeze({
      ...condition,
      value: deepFreeze(structuredClone(condition.value)),
    });
  }
  return Object.freeze({ ...condition });
}

/**
 * Immutable graph of states and transitions. Runs hold it by reference, so a
 * single instance is shared by every concurrent run of the workflow.
 */
export class WorkflowDefinition {
  readonly states: readonly StateDefinition[];
  readonly transitions: readonly TransitionDefinition[];
  /** Non-fatal findings from validation, e.g. unreachable states. */
  readonly warnings: readonly string[];

  private readonly stateIndex: ReadonlyMap<string, StateDefinition>;
  private readonly initial: string;

  private constructor(
    readonly name: string,
    readonly description: string,
    initialState: string,
    states: StateDefinition[],
    transitions: TransitionDefinition[],
    warnings: string[],
  ) {
    this.initial = initialState;
    this.states = Object.freeze(states.map(freezeState));
    this.transitions = Object.freeze(
      transitions.map((transition) =>
        Object.freeze({ ...transition, condition: freezeCondition(transition.condition) }),
      ),
    );
    this.warnings = Object.freeze([...warnings]);
    this.stateIndex = new Map(this.states.map((state) => [state.id, state]));
    Object.freeze(this);
  }

  static builder(name: string, description = ''): WorkflowDefinitionBuilder {
    return new WorkflowDefinitionBuilder(name, description);
  }

  /**
   * Validates a draft and freezes it. Transitions without a condition are
   * unconditional.
   */
  static create(draft: WorkflowDefinitionDraft): WorkflowDefinition {
    const transitions: TransitionDefinition[] = draft.transitions.map(
      (transition) => ({
        from: transition.from,
        to: transition.to,
        condition: transition.condition ?? ALWAYS,
      }),
    );

    const warnings = validateWorkflowDefinition({
      name: draft.name,
      initialState: draft.initialState,
      states: draft.states,
      transitions,
    });

    return new WorkflowDefinition(
      draft.name,
      draft.description ?? '',
      draft.initialState ?? '',
      draft.states,
      transitions,
      warnings,
    );
  }

  initialState(): string {
    return this.initial;
  }

  hasState(stateId: string): boolean {
    return this.stateIndex.has(stateId);
  }

  getState(stateId: string): StateDefinition {
    const state = this.stateIndex.get(stateId);
    if (!state) {
      throw new UnknownStateError(this.name, stateId);
    }
    return state;
  }

  isTerminal(stateId: string): boolean {
    return this.stateIndex.get(stateId)?.terminal === true;
  }

  terminalStates(): string[] {
    return this.states
      .filter((state) => state.terminal === true)
      .map((state) => state.id);
  }

  /** Outgoing transitions of a state in declaration order. */
  transitionsFrom(stateId: string): TransitionDefinition[] {
    return this.transitions.filter((transition) => transition.from === stateId);
  }
}

export class WorkflowDefinitionBuilder {
  private readonly states: StateDefinition[] = [];
  private readonly transitions: TransitionDefinition[] = [];
  private initial?: string;

  constructor(
    private readonly name: string,
    private readonly description: string,
  ) {}

  addState(state: StateDefinition, options?: { initial?: boolean }): this {
    if (this.states.some((existing) => existing.id === state.id)) {
      throw new InvalidWorkflowDefinitionError(
        this.name,
        `state "${state.id}" is declared more than once`,
      );
    }
    this.states.push(state);
    if (options?.initial) {
      this.setInitialState(state.id);
    }
    return this;
  }

  addTransition(
    from: string,
    to: string,
    condition: TransitionCondition = ALWAYS,
  ): this {
    this.transitions.push({ from, to, condition });
    return this;
  }

  setInitialState(stateId: string): this {
    if (this.initial !== undefined && this.initial !== stateId) {
      throw new InvalidWorkflowDefinitionError(
        this.name,
        `initial state is already "${this.initial}", cannot also be "${stateId}"`,
      );
    }
    this.initial = stateId;
    return this;
  }

  build(): WorkflowDefinition {
    return WorkflowDefinition.create({
      name: this.name,
      description: this.description,
      initialState: this.initial,
      states: [...this.states],
      transitions: [...this.transitions],
    });
  }
}
