import { InvalidWorkflowDefinitionError } from '../errors/invalid-workflow-definition.error';
import type {
  StateDefinition,
  TransitionDefinition,
} from '../interfaces/workflow-definition.interface';

export interface WorkflowDefinitionShape {
  name: string;
  initialState?: string;
  states: readonly StateDefinition[];
  transitions: readonly TransitionDefinition[];
}

function assertStateExists(
  name: string,
  stateIds: ReadonlySet<string>,
  stateId: string,
  role: string,
): void {
  if (!stateIds.has(stateId)) {
    throw new InvalidWorkflowDefinitionError(
      name,
      `${role} references unknown state "${stateId}"`,
    );
  }
}

function findReachable(
  initialState: string,
  transitions: readonly TransitionDefinition[],
): Set<string> {
  const reachable = new Set<string>([initialState]);
  const queue = [initialState];

  while (queue.length > 0) {
    const current = queue.shift();
    for (const transition of transitions) {
      if (
        transition.from !== current ||
        transition.condition.type === 'never' ||
        reachable.has(transition.to)
      ) {
        continue;
      }
      reachable.add(transition.to);
      queue.push(transition.to);
    }
  }

  return reachable;
}

/**
 * Throws InvalidWorkflowDefinitionError for structural errors and returns
 * warnings for states that are legal but suspicious. A state may be reachable
 * only through targets an action computes at runtime, so unreachable states
 * are reported, not rejected.
 */
export function validateWorkflowDefinition(
  definition: WorkflowDefinitionShape,
): string[] {
  const { name } = definition;

  if (!name || typeof name !== 'string') {
    throw new InvalidWorkflowDefinitionError(
      '',
      'name must be a non-empty string',
    );
  }

  if (definition.states.length === 0) {
    throw new InvalidWorkflowDefinitionError(name, 'declares no states');
  }

  const stateIds = new Set<string>();
  for (const state of definition.states) {
    if (!state.id || typeof state.id !== 'string') {
      throw new InvalidWorkflowDefinitionError(
        name,
        'state ids must be non-empty strings',
      );
    }
    if (stateIds.has(state.id)) {
      throw new InvalidWorkflowDefinitionError(
        name,
        `state "${state.id}" is declared more than once`,
      );
    }
    if (state.terminal && state.pause) {
      throw new InvalidWorkflowDefinitionError(
        name,
        `state "${state.id}" cannot be both terminal and a pause point`,
      );
    }
    stateIds.add(state.id);
  }

  if (!definition.initialState) {
    throw new InvalidWorkflowDefinitionError(
      name,
      'an initial state must be declared',
    );
  }
  assertStateExists(name, stateIds, definition.initialState, 'initial state');

  for (const transition of definition.transitions) {
    assertStateExists(
      name,
      stateIds,
      transition.from,
      `transition ${transition.from} -> ${transition.to}`,
    );
    assertStateExists(
      name,
      stateIds,
      transition.to,
      `transition ${transition.from} -> ${transition.to}`,
    );
    if (
      transition.condition.type === 'context-equals' &&
      !transition.condition.variable
    ) {
      throw new InvalidWorkflowDefinitionError(
        name,
        `transition ${transition.from} -> ${transition.to} compares an empty variable name`,
      );
    }
  }

  const warnings: string[] = [];
  const reachable = findReachable(
    definition.initialState,
    definition.transitions,
  );

  for (const state of definition.states) {
    if (!reachable.has(state.id)) {
      warnings.push(
        `State "${state.id}" is not reachable from initial state "${definition.initialState}"`,
      );
    }
    const hasOutgoing = definition.transitions.some(
      (transition) => transition.from === state.id,
    );
    if (!state.terminal && !hasOutgoing) {
      warnings.push(
        `State "${state.id}" is not terminal and has no outgoing transitions`,
      );
    }
  }

  return warnings;
}
