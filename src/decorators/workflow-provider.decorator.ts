import { SetMetadata } from '@nestjs/common';
import { WORKFLOW_PROVIDER_METADATA } from '../workflow.constants';
import type { WorkflowDefinition } from '../models/workflow-definition';

export interface WorkflowProviderMetadata {
  definitions: WorkflowDefinition[];
}

/**
 * Registers workflow definitions with the WorkflowRegistry when the decorated
 * provider is discovered.
 */
export function ProvidesWorkflows(
  ...definitions: WorkflowDefinition[]
): ClassDecorator {
  const metadata: WorkflowProviderMetadata = { definitions };
  return SetMetadata(WORKFLOW_PROVIDER_METADATA, metadata);
}
