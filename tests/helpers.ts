import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AbortAction, LogAction, SetVariableAction } from '../src/actions/core.actions';
import {
  IssueCurrentAction,
  IssueWorkAction,
} from '../src/actions/issue-branch.actions';
import { IssueMergeAction } from '../src/actions/issue-merge.action';
import {
  IssueAllCompleteAction,
  IssueCreateAction,
  IssueMarkCompleteAction,
  IssueUpdateAction,
} from '../src/actions/issue.actions';
import { InMemoryRunStorageAdapter } from '../src/adapters/in-memory-run-storage.adapter';
import { ResourceGuards } from '../src/guards/resource-guards';
import type { IAbortSignal } from '../src/interfaces/abort-signal.interface';
import type { IssueStore } from '../src/interfaces/issue-store.interface';
import type { TemplateRenderer } from '../src/interfaces/template-renderer.interface';
import type { VersionControl } from '../src/interfaces/version-control.interface';
import {
  GitCommandError,
  GitCommandRunner,
} from '../src/collaborators/git-cli-version-control';
import { LiquidTemplateRenderer } from '../src/collaborators/liquid-template-renderer';
import { ActionDispatcher } from '../src/services/action-dispatcher.service';
import { WorkflowExecutor } from '../src/services/workflow-executor.service';
import { WorkflowRegistry } from '../src/services/workflow-registry.service';

/** Abort signal held in memory; records every call. */
export class InMemoryAbortSignal implements IAbortSignal {
  reason: string | null = null;
  readonly raised: string[] = [];
  clears = 0;

  async raise(reason: string): Promise<void> {
    this.reason = reason;
    this.raised.push(reason);
  }

  async isRaised(): Promise<string | null> {
    return this.reason;
  }

  async clear(): Promise<boolean> {
    this.clears += 1;
    const existed = this.reason !== null;
    this.reason = null;
    return existed;
  }
}

export function createMockDiscovery(): {
  discovery: DiscoveryService;
  reflector: Reflector;
} {
  const discovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const reflector = { get: () => undefined } as unknown as Reflector;
  return { discovery, reflector };
}

export function createMockRegistry(): WorkflowRegistry {
  const { discovery, reflector } = createMockDiscovery();
  return new WorkflowRegistry(discovery, reflector);
}

export function createDispatcher(
  abortSignal: IAbortSignal = new InMemoryAbortSignal(),
  renderer: TemplateRenderer = new LiquidTemplateRenderer(),
): ActionDispatcher {
  const { discovery, reflector } = createMockDiscovery();
  return new ActionDispatcher(discovery, reflector, abortSignal, renderer);
}

export function registerBuiltinActions(
  dispatcher: ActionDispatcher,
  guards: ResourceGuards,
): void {
  dispatcher.register(new SetVariableAction());
  dispatcher.register(new LogAction());
  dispatcher.register(new AbortAction());
  dispatcher.register(new IssueCreateAction(guards));
  dispatcher.register(new IssueUpdateAction(guards));
  dispatcher.register(new IssueMarkCompleteAction(guards));
  dispatcher.register(new IssueAllCompleteAction(guards));
  dispatcher.register(new IssueCurrentAction(guards));
  dispatcher.register(new IssueWorkAction(guards));
  dispatcher.register(new IssueMergeAction(guards));
}

export interface TestRuntime {
  abortSignal: InMemoryAbortSignal;
  storage: InMemoryRunStorageAdapter;
  eventEmitter: EventEmitter2;
  registry: WorkflowRegistry;
  dispatcher: ActionDispatcher;
  guards: ResourceGuards;
  executor: WorkflowExecutor;
}

export function createTestRuntime(
  options: {
    issueStore?: IssueStore;
    versionControl?: VersionControl;
    maxTransitions?: number;
    abortSignal?: InMemoryAbortSignal;
  } = {},
): TestRuntime {
  const abortSignal = options.abortSignal ?? new InMemoryAbortSignal();
  const storage = new InMemoryRunStorageAdapter();
  const eventEmitter = new EventEmitter2();
  const registry = createMockRegistry();
  const dispatcher = createDispatcher(abortSignal);
  const guards = new ResourceGuards(options.issueStore, options.versionControl);
  registerBuiltinActions(dispatcher, guards);

  const executor = new WorkflowExecutor(
    registry,
    dispatcher,
    abortSignal,
    storage,
    eventEmitter,
    { maxTransitions: options.maxTransitions ?? 1000 },
  );

  return {
    abortSignal,
    storage,
    eventEmitter,
    registry,
    dispatcher,
    guards,
    executor,
  };
}

/** Promise with its resolve function exposed, for ordering concurrent work in tests. */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * GitCommandRunner answering from a table keyed by the joined argument list.
 * Unknown commands fail the way git does for a missing ref.
 */
export function createStubGitRunner(
  responses: Record<string, string | Error>,
): { runner: GitCommandRunner; calls: string[] } {
  const calls: string[] = [];
  const runner: GitCommandRunner = async (args) => {
    const key = args.join(' ');
    calls.push(key);
    const response = responses[key];
    if (response === undefined) {
      throw new GitCommandError(args, '', `fatal: unexpected command: git ${key}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return { stdout: response, stderr: '' };
  };
  return { runner, calls };
}

/** Repository with main, release/2 and issue/<issueName>, the issue branch cut from release/2. */
export function releaseBranchRepository(issueName: string): Record<string, string> {
  const source = `issue/${issueName}`;
  return {
    'rev-parse --abbrev-ref HEAD': `${source}\n`,
    [`rev-parse --verify --quiet refs/heads/${source}`]: 'abc123\n',
    'for-each-ref --format=%(refname:short) refs/heads/': `main\nrelease/2\n${source}\n`,
    [`merge-base ${source} main`]: 'base-main\n',
    [`rev-list --count base-main..${source}`]: '5\n',
    [`merge-base ${source} release/2`]: 'base-release\n',
    [`rev-list --count base-release..${source}`]: '2\n',
    'checkout release/2': '',
    [`merge --no-ff ${source} -m Merge ${source} into release/2`]: '',
    [`branch -D ${source}`]: '',
    'log -1 --pretty=format:%H|%s|%an|%ad':
      `0123456789abcdef|Merge ${source} into release/2|Test Author|Mon Jan 1 2024`,
    'merge --abort': '',
  };
}
