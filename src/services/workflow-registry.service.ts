import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { WorkflowNotRegisteredError } from '../errors/workflow-not-registered.error';
import type { WorkflowProviderMetadata } from '../decorators/workflow-provider.decorator';
import { WorkflowDefinition } from '../models/workflow-definition';
import {
  INITIAL_WORKFLOWS,
  WORKFLOW_PROVIDER_METADATA,
} from '../workflow.constants';

export interface RegisteredWorkflow {
  name: string;
  definition: WorkflowDefinition;
  /** Where the definition came from: a provider class name or "module options". */
  source: string;
}

@Injectable()
export class WorkflowRegistry implements OnModuleInit {
  private readonly logger = new Logger(WorkflowRegistry.name);
  private readonly registrations = new Map<string, RegisteredWorkflow>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Optional()
    @Inject(INITIAL_WORKFLOWS)
    private readonly initialWorkflows: WorkflowDefinition[] = [],
  ) {}

  onModuleInit(): void {
    for (const definition of this.initialWorkflows) {
      this.register(definition, 'module options');
    }

    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<WorkflowProviderMetadata | undefined>(
        WORKFLOW_PROVIDER_METADATA,
        wrapper.metatype,
      );

      if (metadata) {
        for (const definition of metadata.definitions) {
          this.register(definition, wrapper.metatype.name);
        }
      }
    }
  }

  register(definition: WorkflowDefinition, source = 'manual'): void {
    const existing = this.registrations.get(definition.name);
    if (existing) {
      throw new DuplicateRegistrationError(
        'workflow',
        definition.name,
        existing.source,
        source,
      );
    }

    for (const warning of definition.warnings) {
      this.logger.warn(`Workflow "${definition.name}": ${warning}`);
    }
    this.registrations.set(definition.name, {
      name: definition.name,
      definition,
      source,
    });
    this.logger.log(`Registered workflow: ${definition.name} (${source})`);
  }

  get(name: string): RegisteredWorkflow | undefined {
    return this.registrations.get(name);
  }

  getAll(): RegisteredWorkflow[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(name: string): RegisteredWorkflow {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new WorkflowNotRegisteredError(name);
    }
    return registration;
  }
}
