// Module
export { AgentWorkflowModule, BUILTIN_ACTIONS } from './workflow.module';

// Services
export { WorkflowExecutor, RUN_METADATA } from './services/workflow-executor.service';
export { WorkflowRegistry } from './services/workflow-registry.service';
export type { RegisteredWorkflow } from './services/workflow-registry.service';
export { ActionDispatcher } from './services/action-dispatcher.service';

// Models
export {
  WorkflowDefinition,
  WorkflowDefinitionBuilder,
} from './models/workflow-definition';
export { WorkflowRun, isTerminalStatus } from './models/workflow-run';
export { WorkflowRunId } from './models/workflow-run-id';

// Decorators
export { ProvidesWorkflows } from './decorators/workflow-provider.decorator';
export { WorkflowActionProvider } from './decorators/workflow-action-provider.decorator';

// Actions
export { success, recoverable, fatal, abort } from './actions/action-results';
export { AbortAction, LogAction, SetVariableAction } from './actions/core.actions';
export {
  IssueAllCompleteAction,
  IssueCreateAction,
  IssueMarkCompleteAction,
  IssueUpdateAction,
} from './actions/issue.actions';
export { IssueCurrentAction, IssueWorkAction } from './actions/issue-branch.actions';
export { IssueMergeAction } from './actions/issue-merge.action';

// Abort signal and guards
export { FileAbortSignal } from './signals/file-abort-signal';
export { ExclusiveGuard } from './guards/exclusive-guard';
export type { GuardOptions } from './guards/exclusive-guard';
export { SharedExclusiveGuard } from './guards/shared-exclusive-guard';
export {
  ResourceGuards,
  ISSUE_STORE_GUARD,
  VERSION_CONTROL_GUARD,
} from './guards/resource-guards';

// Collaborators
export { FileIssueStore } from './collaborators/file-issue-store';
export { InMemoryIssueStore } from './collaborators/in-memory-issue-store';
export {
  GitCliVersionControl,
  GitCommandError,
  execGit,
} from './collaborators/git-cli-version-control';
export type {
  GitCliVersionControlOptions,
  GitCommandOutput,
  GitCommandRunner,
} from './collaborators/git-cli-version-control';
export { LiquidTemplateRenderer } from './collaborators/liquid-template-renderer';
export { selectMergeTarget } from './utils/select-merge-target';
export type { MergeTargetCandidate } from './utils/select-merge-target';
export { classifyMergeFailure } from './utils/classify-merge-failure';

// Tools
export { createMcpServer } from './tools/mcp-server';
export type { McpServerInfo } from './tools/mcp-server';
export { WorkflowToolRegistry, ISSUE_TOOL_ACTIONS } from './tools/workflow-tool-registry.service';
export { ActionTool } from './tools/action.tool';
export {
  AbortCreateTool,
  WorkflowRunTool,
  WorkflowStatusTool,
} from './tools/workflow.tools';

// Interfaces
export type {
  ContextPredicate,
  JsonValue,
  RunContext,
  StateActionConfig,
  StateDefinition,
  TransitionCondition,
  TransitionDefinition,
  WorkflowDefinitionDraft,
} from './interfaces/workflow-definition.interface';
export type {
  RunHistoryEntry,
  RunHistoryRecord,
  RunRecord,
  RunSummary,
  WorkflowRunStatus,
} from './interfaces/workflow-run.interface';
export type {
  ActionInput,
  ActionResult,
  DispatchInput,
  WorkflowActionHandler,
} from './interfaces/action.interface';
export type { IAbortSignal } from './interfaces/abort-signal.interface';
export type { Issue, IssueStore } from './interfaces/issue-store.interface';
export type { VersionControl } from './interfaces/version-control.interface';
export type { TemplateRenderer } from './interfaces/template-renderer.interface';
export type { IRunStorageAdapter } from './interfaces/run-storage-adapter.interface';
export type {
  ToolCallResult,
  ToolTextContent,
  WorkflowTool,
} from './interfaces/tool.interface';
export type {
  AgentWorkflowModuleAsyncOptions,
  AgentWorkflowModuleOptions,
  ResolvedWorkflowOptions,
} from './interfaces/workflow-module-options.interface';

// Adapters
export { InMemoryRunStorageAdapter } from './adapters/in-memory-run-storage.adapter';
export { PgRunStorageAdapter } from './adapters/pg-run-storage.adapter';

// Errors
export { AbortRaisedError } from './errors/abort-raised.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { GitOperationError } from './errors/git-operation.error';
export { InvalidRunIdError } from './errors/invalid-run-id.error';
export { InvalidWorkflowDefinitionError } from './errors/invalid-workflow-definition.error';
export {
  InvalidIssueNameError,
  IssueAlreadyExistsError,
  IssueNotFoundError,
} from './errors/issue.errors';
export { LockOrderViolationError } from './errors/lock-order-violation.error';
export { RunNotPausedError } from './errors/run-not-paused.error';
export { RunNotRunningError } from './errors/run-not-running.error';
export { TemplateRenderError } from './errors/template-render.error';
export { TransitionLimitExceededError } from './errors/transition-limit-exceeded.error';
export { UnknownStateError } from './errors/unknown-state.error';
export { WorkflowNotRegisteredError } from './errors/workflow-not-registered.error';

// Events
export { RunEventType } from './events/run-event-type.enum';
export type {
  RunActionFailedEvent,
  RunCreatedEvent,
  RunFinishedEvent,
  RunTransitionEvent,
} from './events/run-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  ABORT_SIGNAL,
  AGENT_WORKFLOW_OPTIONS,
  DEFAULT_ABORT_FILE,
  DEFAULT_MAX_TRANSITIONS,
  DEFAULT_TRUNK_BRANCHES,
  RUN_STORAGE_ADAPTER,
  TEMPLATE_RENDERER,
} from './workflow.constants';
