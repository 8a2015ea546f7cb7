import { Injectable } from '@nestjs/common';
import { WorkflowActionProvider } from '../decorators/workflow-action-provider.decorator';
import { ResourceGuards } from '../guards/resource-guards';
import type {
  ActionInput,
  ActionResult,
  WorkflowActionHandler,
} from '../interfaces/action.interface';
import type { Issue } from '../interfaces/issue-store.interface';
import { errorMessage } from '../utils/error-utils';
import { ISSUE_BRANCH_PREFIX } from '../workflow.constants';
import { recoverable, success } from './action-results';
import { issueNameArgs, noArgs } from './action-schemas';
import {
  GIT_UNAVAILABLE,
  ISSUE_STORE_UNAVAILABLE,
  issueFailure,
} from './issue-failure';

@Injectable()
@WorkflowActionProvider()
export class IssueCurrentAction implements WorkflowActionHandler {
  readonly name = 'issue_current';
  readonly description =
    'Report the issue being worked on, derived from the current branch';
  readonly argsSchema = noArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(): Promise<ActionResult> {
    return this.guards.git.withExclusive(async (git) => {
      if (!git) return recoverable(GIT_UNAVAILABLE);

      let branch: string;
      try {
        branch = await git.currentBranch();
      } catch (error) {
        return recoverable(`Failed to get current branch: ${errorMessage(error)}`);
      }

      if (branch.startsWith(ISSUE_BRANCH_PREFIX)) {
        const issueName = branch.slice(ISSUE_BRANCH_PREFIX.length);
        return success(
          { current_issue: issueName },
          `Currently working on issue: ${issueName}`,
        );
      }
      return success(
        { current_issue: null },
        `Not on an issue branch. Current branch: ${branch}`,
      );
    });
  }
}

/**
 * Switches to the issue's work branch. The issue is read under the shared
 * issue-store lock, which is released before the version-control lock is
 * taken.
 */
@Injectable()
@WorkflowActionProvider()
export class IssueWorkAction implements WorkflowActionHandler {
  readonly name = 'issue_work';
  readonly description = 'Switch to the work branch for an issue, creating it if needed';
  readonly argsSchema = issueNameArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name } = issueNameArgs.parse(input.args);

    const lookup = await this.guards.issues.withShared(
      async (store): Promise<Issue | ActionResult> => {
        if (!store) return recoverable(ISSUE_STORE_UNAVAILABLE);
        try {
          return await store.get(name);
        } catch (error) {
          return issueFailure(error, `get issue ${name}`);
        }
      },
    );
    if ('kind' in lookup) return lookup;

    return this.guards.git.withExclusive(async (git) => {
      if (!git) return recoverable(GIT_UNAVAILABLE);
      try {
        const branch = await git.createWorkBranch(lookup.name);
        return success(
          { issue_branch: branch },
          `Switched to work branch: ${branch}`,
        );
      } catch (error) {
        return recoverable(`Failed to create work branch: ${errorMessage(error)}`);
      }
    });
  }
}
