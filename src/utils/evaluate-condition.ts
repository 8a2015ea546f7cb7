import { isDeepStrictEqual } from 'util';
import { SUCCESS_VARIABLE } from '../workflow.constants';
import type {
  RunContext,
  TransitionCondition,
  TransitionDefinition,
} from '../interfaces/workflow-definition.interface';
import type { WorkflowDefinition } from '../models/workflow-definition';

export function evaluateCondition(
  condition: TransitionCondition,
  context: Readonly<RunContext>,
): boolean {
  switch (condition.type) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'on-success':
      return context[SUCCESS_VARIABLE] === true;
    case 'on-failure':
      return context[SUCCESS_VARIABLE] === false;
    case 'context-equals':
      return isDeepStrictEqual(context[condition.variable], condition.value);
    case 'custom': {
      const result = condition.predicate(context);
      if (typeof result !== 'boolean') {
        throw new Error(
          `Transition predicate${condition.description ? ` "${condition.description}"` : ''} must return a synchronous boolean value`,
        );
      }
      return result;
    }
  }
}

/**
 * First outgoing transition of `stateId`, in declaration order, whose
 * condition holds for the context.
 */
export function resolveNextTransition(
  definition: WorkflowDefinition,
  stateId: string,
  context: Readonly<RunContext>,
): TransitionDefinition | undefined {
  return definition
    .transitionsFrom(stateId)
    .find((transition) => evaluateCondition(transition.condition, context));
}
