import { Logger } from '@nestjs/common';
import { IssueMergeAction } from '../../src/actions/issue-merge.action';
import {
  GitCliVersionControl,
  GitCommandError,
} from '../../src/collaborators/git-cli-version-control';
import { InMemoryIssueStore } from '../../src/collaborators/in-memory-issue-store';
import { ResourceGuards } from '../../src/guards/resource-guards';
import type { ActionInput } from '../../src/interfaces/action.interface';
import type { JsonValue } from '../../src/interfaces/workflow-definition.interface';
import {
  InMemoryAbortSignal,
  createStubGitRunner,
  releaseBranchRepository,
} from '../helpers';

const MERGE_COMMAND = 'merge --no-ff issue/fix -m Merge issue/fix into release/2';

function input(args: Record<string, JsonValue>): ActionInput {
  return {
    runId: 'run-1',
    state: 'merging',
    args,
    context: {},
    abortSignal: new InMemoryAbortSignal(),
  };
}

describe('IssueMergeAction', () => {
  let store: InMemoryIssueStore;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    store = new InMemoryIssueStore();
    await store.create('fix', 'Fix the login form');
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function actionFor(responses: Record<string, string | Error>): {
    action: IssueMergeAction;
    calls: string[];
  } {
    const { runner, calls } = createStubGitRunner(responses);
    const git = new GitCliVersionControl({ cwd: '/repo', runner });
    return {
      action: new IssueMergeAction(new ResourceGuards(store, git)),
      calls,
    };
  }

  it('should refuse to merge an issue that is not complete', async () => {
    const { action, calls } = actionFor(releaseBranchRepository('fix'));

    await expect(action.execute(input({ name: 'fix' }))).resolves.toEqual({
      kind: 'recoverable',
      message: "Issue 'fix' must be completed before merging",
    });
    expect(calls).toEqual([]);
  });

  it('should merge into the branch the issue was cut from and delete the work branch', async () => {
    await store.markComplete('fix');
    const { action, calls } = actionFor(releaseBranchRepository('fix'));

    const result = await action.execute(
      input({ name: 'fix', delete_branch: true }),
    );

    expect(result).toEqual({
      kind: 'success',
      contextUpdates: { merged_into: 'release/2' },
      message:
        'Merged work branch for issue fix to release/2 (determined by git merge-base) and deleted branch issue/fix' +
        '\n\nMerge commit: 01234567\nMessage: Merge issue/fix into release/2\nAuthor: Test Author\nDate: Mon Jan 1 2024',
    });
    expect(calls).toContain('checkout release/2');
    expect(calls).toContain(MERGE_COMMAND);
    expect(calls).toContain('branch -D issue/fix');
  });

  it('should keep the work branch unless asked to delete it', async () => {
    await store.markComplete('fix');
    const { action, calls } = actionFor(releaseBranchRepository('fix'));

    await action.execute(input({ name: 'fix' }));

    expect(calls).not.toContain('branch -D issue/fix');
  });

  it('should report a failed branch deletion in the message', async () => {
    await store.markComplete('fix');
    const { action } = actionFor({
      ...releaseBranchRepository('fix'),
      'branch -D issue/fix': new GitCommandError(
        ['branch', '-D', 'issue/fix'],
        '',
        'error: branch is checked out',
      ),
    });

    const result = await action.execute(
      input({ name: 'fix', delete_branch: true }),
    );

    expect(result.kind).toBe('success');
    expect(result.message).toContain(
      "to release/2 (determined by git merge-base) but failed to delete branch: Git operation 'delete branch' failed: error: branch is checked out\n\n",
    );
  });

  it('should fail the run on a merge conflict', async () => {
    await store.markComplete('fix');
    const { action, calls } = actionFor({
      ...releaseBranchRepository('fix'),
      [MERGE_COMMAND]: new GitCommandError(
        MERGE_COMMAND.split(' '),
        'CONFLICT (content): Merge conflict in login.ts',
        '',
      ),
    });

    const result = await action.execute(input({ name: 'fix' }));

    expect(result).toEqual({
      kind: 'fatal',
      message:
        "Failed to merge branch for issue fix: Git operation 'merge branch' failed: Failed to merge 'issue/fix' into 'release/2': CONFLICT (content): Merge conflict in login.ts",
      reason: 'irrecoverable-repository-state',
    });
    expect(calls).toContain('merge --abort');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain('(matched "CONFLICT")');
  });

  it('should treat a transient merge failure as recoverable', async () => {
    await store.markComplete('fix');
    const { action } = actionFor({
      ...releaseBranchRepository('fix'),
      [MERGE_COMMAND]: new GitCommandError(
        MERGE_COMMAND.split(' '),
        '',
        "fatal: Unable to create '/repo/.git/index.lock': File exists.",
      ),
    });

    const result = await action.execute(input({ name: 'fix' }));

    expect(result).toEqual({
      kind: 'recoverable',
      message:
        "Failed to merge branch for issue fix: Git operation 'merge branch' failed: Failed to merge 'issue/fix' into 'release/2': fatal: Unable to create '/repo/.git/index.lock': File exists.",
    });
    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith(result.message);
  });

  it('should report a missing version control handle as recoverable', async () => {
    await store.markComplete('fix');
    const action = new IssueMergeAction(new ResourceGuards(store));

    await expect(action.execute(input({ name: 'fix' }))).resolves.toEqual({
      kind: 'recoverable',
      message: 'Git operations not available',
    });
  });
});
