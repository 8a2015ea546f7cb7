import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AbortAction, LogAction, SetVariableAction } from './actions/core.actions';
import {
  IssueCurrentAction,
  IssueWorkAction,
} from './actions/issue-branch.actions';
import { IssueMergeAction } from './actions/issue-merge.action';
import {
  IssueAllCompleteAction,
  IssueCreateAction,
  IssueMarkCompleteAction,
  IssueUpdateAction,
} from './actions/issue.actions';
import { InMemoryRunStorageAdapter } from './adapters/in-memory-run-storage.adapter';
import { LiquidTemplateRenderer } from './collaborators/liquid-template-renderer';
import { ResourceGuards } from './guards/resource-guards';
import {
  AgentWorkflowModuleAsyncOptions,
  AgentWorkflowModuleOptions,
  ResolvedWorkflowOptions,
} from './interfaces/workflow-module-options.interface';
import { ActionDispatcher } from './services/action-dispatcher.service';
import { WorkflowExecutor } from './services/workflow-executor.service';
import { WorkflowRegistry } from './services/workflow-registry.service';
import { FileAbortSignal } from './signals/file-abort-signal';
import { WorkflowToolRegistry } from './tools/workflow-tool-registry.service';
import {
  ABORT_SIGNAL,
  AGENT_WORKFLOW_OPTIONS,
  AGENT_WORKFLOW_RAW_OPTIONS,
  DEFAULT_ABORT_FILE,
  DEFAULT_MAX_TRANSITIONS,
  INITIAL_WORKFLOWS,
  RUN_STORAGE_ADAPTER,
  TEMPLATE_RENDERER,
} from './workflow.constants';

export const BUILTIN_ACTIONS = [
  SetVariableAction,
  LogAction,
  AbortAction,
  IssueCreateAction,
  IssueUpdateAction,
  IssueMarkCompleteAction,
  IssueAllCompleteAction,
  IssueCurrentAction,
  IssueWorkAction,
  IssueMergeAction,
];

/** Providers derived from the raw options, shared by forRoot and forRootAsync. */
function createDerivedProviders(): Provider[] {
  return [
    {
      provide: AGENT_WORKFLOW_OPTIONS,
      useFactory: (
        options: AgentWorkflowModuleOptions,
      ): ResolvedWorkflowOptions => ({
        maxTransitions: options.maxTransitions ?? DEFAULT_MAX_TRANSITIONS,
      }),
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: ABORT_SIGNAL,
      useFactory: (options: AgentWorkflowModuleOptions) =>
        options.abortSignal ??
        FileAbortSignal.forProject(
          options.projectRoot ?? process.cwd(),
          options.abortFilePath ?? DEFAULT_ABORT_FILE,
        ),
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: RUN_STORAGE_ADAPTER,
      useFactory: (options: AgentWorkflowModuleOptions) =>
        options.storage ?? new InMemoryRunStorageAdapter(),
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: TEMPLATE_RENDERER,
      useFactory: (options: AgentWorkflowModuleOptions) =>
        options.templateRenderer ??
        new LiquidTemplateRenderer(options.partials),
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: INITIAL_WORKFLOWS,
      useFactory: (options: AgentWorkflowModuleOptions) =>
        options.workflows ?? [],
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: ResourceGuards,
      useFactory: (options: AgentWorkflowModuleOptions) =>
        new ResourceGuards(options.issueStore, options.versionControl),
      inject: [AGENT_WORKFLOW_RAW_OPTIONS],
    },
    WorkflowRegistry,
    ActionDispatcher,
    WorkflowExecutor,
    WorkflowToolRegistry,
    ...BUILTIN_ACTIONS,
  ];
}

const EXPORTS = [
  WorkflowExecutor,
  WorkflowRegistry,
  ActionDispatcher,
  WorkflowToolRegistry,
  ResourceGuards,
  ABORT_SIGNAL,
  RUN_STORAGE_ADAPTER,
  TEMPLATE_RENDERER,
];

@Module({})
export class AgentWorkflowModule {
  static forRoot(options: AgentWorkflowModuleOptions = {}): DynamicModule {
    return {
      module: AgentWorkflowModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        { provide: AGENT_WORKFLOW_RAW_OPTIONS, useValue: options },
        ...createDerivedProviders(),
      ],
      exports: EXPORTS,
      global: true,
    };
  }

  static forRootAsync(options: AgentWorkflowModuleAsyncOptions): DynamicModule {
    return {
      module: AgentWorkflowModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: AGENT_WORKFLOW_RAW_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...createDerivedProviders(),
      ],
      exports: EXPORTS,
      global: true,
    };
  }
}
