import type { ModuleMetadata } from '@nestjs/common';
import type { IAbortSignal } from './abort-signal.interface';
import type { IssueStore } from './issue-store.interface';
import type { IRunStorageAdapter } from './run-storage-adapter.interface';
import type { TemplateRenderer } from './template-renderer.interface';
import type { VersionControl } from './version-control.interface';
import type { WorkflowDefinition } from '../models/workflow-definition';

export interface AgentWorkflowModuleOptions {
  /** Directory the abort marker path is resolved against. Default: process.cwd() */
  projectRoot?: string;

  /** Abort marker location relative to projectRoot. Default: '.agent-workflows/.abort' */
  abortFilePath?: string;

  /** Optional abort signal override. Takes precedence over abortFilePath. */
  abortSignal?: IAbortSignal;

  /** Issue store guarded by a shared/exclusive lock. Omit when not configured. */
  issueStore?: IssueStore;

  /** Version-control handle guarded by an exclusive lock. Omit when not configured. */
  versionControl?: VersionControl;

  /** Renderer for action arguments. Default: LiquidTemplateRenderer */
  templateRenderer?: TemplateRenderer;

  /** Partials for the default renderer, keyed by name. Ignored when templateRenderer is set. */
  partials?: Record<string, string>;

  /** Run history storage. Default: InMemoryRunStorageAdapter */
  storage?: IRunStorageAdapter;

  /** Workflows registered at startup in addition to decorated providers. */
  workflows?: WorkflowDefinition[];

  /** Max transitions a single execute() call may perform. Default: 1000 */
  maxTransitions?: number;
}

export interface AgentWorkflowModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) => Promise<AgentWorkflowModuleOptions> | AgentWorkflowModuleOptions;
  inject?: any[];
}

export interface ResolvedWorkflowOptions {
  maxTransitions: number;
}
