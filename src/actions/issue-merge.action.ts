import { Injectable, Logger } from '@nestjs/common';
import { WorkflowActionProvider } from '../decorators/workflow-action-provider.decorator';
import { ResourceGuards } from '../guards/resource-guards';
import type {
  ActionInput,
  ActionResult,
  WorkflowActionHandler,
} from '../interfaces/action.interface';
import type { Issue } from '../interfaces/issue-store.interface';
import {
  classifyMergeFailure,
  findIrrecoverableMarker,
} from '../utils/classify-merge-failure';
import { errorMessage } from '../utils/error-utils';
import { formatCommitInfo } from '../utils/format-commit-info';
import { ISSUE_BRANCH_PREFIX } from '../workflow.constants';
import { fatal, recoverable, success } from './action-results';
import { issueMergeArgs } from './action-schemas';
import {
  GIT_UNAVAILABLE,
  ISSUE_STORE_UNAVAILABLE,
  issueFailure,
} from './issue-failure';

@Injectable()
@WorkflowActionProvider()
export class IssueMergeAction implements WorkflowActionHandler {
  private readonly logger = new Logger(IssueMergeAction.name);

  readonly name = 'issue_merge';
  readonly description =
    'Merge the work branch of a completed issue into the branch it was created from';
  readonly argsSchema = issueMergeArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name, delete_branch: deleteBranch } = issueMergeArgs.parse(
      input.args,
    );

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

    if (!lookup.completed) {
      return recoverable(
        `Issue '${lookup.name}' must be completed before merging`,
      );
    }

    const issueName = lookup.name;
    const branch = `${ISSUE_BRANCH_PREFIX}${issueName}`;

    return this.guards.git.withExclusive(async (git) => {
      if (!git) return recoverable(GIT_UNAVAILABLE);

      let target: string;
      try {
        target = await git.mergeBranch(issueName);
      } catch (error) {
        return this.mergeFailure(issueName, errorMessage(error));
      }

      let message = `Merged work branch for issue ${issueName} to ${target} (determined by git merge-base)`;

      if (deleteBranch) {
        try {
          await git.deleteBranch(branch);
          message += ` and deleted branch ${branch}`;
        } catch (error) {
          message += ` but failed to delete branch: ${errorMessage(error)}`;
        }
      }

      try {
        message += formatCommitInfo(await git.lastCommitInfo());
      } catch (error) {
        this.logger.warn(`Could not read merge commit: ${errorMessage(error)}`);
      }

      return success({ merged_into: target }, message);
    });
  }

  private mergeFailure(issueName: string, detail: string): ActionResult {
    const message = `Failed to merge branch for issue ${issueName}: ${detail}`;

    if (classifyMergeFailure(detail) === 'irrecoverable') {
      const marker = findIrrecoverableMarker(detail) ?? 'unknown';
      this.logger.error(
        `Irrecoverable repository state while merging issue ${issueName} (matched "${marker}"): ${detail}`,
      );
      return fatal(message, 'irrecoverable-repository-state');
    }

    this.logger.warn(message);
    return recoverable(message);
  }
}
