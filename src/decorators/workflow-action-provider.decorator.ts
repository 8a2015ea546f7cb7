import { SetMetadata } from '@nestjs/common';
import { ACTION_PROVIDER_METADATA } from '../workflow.constants';

/**
 * Marks a provider as a WorkflowActionHandler. The ActionDispatcher registers
 * every marked provider instance under its `name` when the module starts.
 */
export function WorkflowActionProvider(): ClassDecorator {
  return SetMetadata(ACTION_PROVIDER_METADATA, true);
}
