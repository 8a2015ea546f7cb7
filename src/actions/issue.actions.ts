import { Injectable } from '@nestjs/common';
import { WorkflowActionProvider } from '../decorators/workflow-action-provider.decorator';
import { ResourceGuards } from '../guards/resource-guards';
import type {
  ActionInput,
  ActionResult,
  WorkflowActionHandler,
} from '../interfaces/action.interface';
import type { Issue } from '../interfaces/issue-store.interface';
import { ISSUE_NUMBER_WIDTH } from '../workflow.constants';
import { recoverable, success } from './action-results';
import {
  issueCreateArgs,
  issueNameArgs,
  issueUpdateArgs,
  noArgs,
} from './action-schemas';
import { ISSUE_STORE_UNAVAILABLE, issueFailure } from './issue-failure';

export function formatIssueNumber(issue: Issue): string {
  return `#${String(issue.number).padStart(ISSUE_NUMBER_WIDTH, '0')}`;
}

@Injectable()
@WorkflowActionProvider()
export class IssueCreateAction implements WorkflowActionHandler {
  readonly name = 'issue_create';
  readonly description = 'Create a new issue as a numbered markdown file';
  readonly argsSchema = issueCreateArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name, content } = issueCreateArgs.parse(input.args);

    return this.guards.issues.withExclusive(async (store) => {
      if (!store) return recoverable(ISSUE_STORE_UNAVAILABLE);
      try {
        const issue = await store.create(name, content);
        return success(
          { issue_name: issue.name, issue_number: issue.number },
          `Created issue ${formatIssueNumber(issue)} ${issue.name}`,
        );
      } catch (error) {
        return issueFailure(error, 'create issue');
      }
    });
  }
}

@Injectable()
@WorkflowActionProvider()
export class IssueUpdateAction implements WorkflowActionHandler {
  readonly name = 'issue_update';
  readonly description = 'Replace or append to the content of an issue';
  readonly argsSchema = issueUpdateArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name, content, append } = issueUpdateArgs.parse(input.args);

    return this.guards.issues.withExclusive(async (store) => {
      if (!store) return recoverable(ISSUE_STORE_UNAVAILABLE);
      try {
        let next = content;
        if (append) {
          const existing = await store.get(name);
          next = existing.content ? `${existing.content}\n\n${content}` : content;
        }
        const issue = await store.update(name, next);
        return success(
          {},
          `Updated issue ${formatIssueNumber(issue)} ${issue.name}`,
        );
      } catch (error) {
        return issueFailure(error, 'update issue');
      }
    });
  }
}

@Injectable()
@WorkflowActionProvider()
export class IssueMarkCompleteAction implements WorkflowActionHandler {
  readonly name = 'issue_mark_complete';
  readonly description = 'Mark an issue as complete';
  readonly argsSchema = issueNameArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(input: ActionInput): Promise<ActionResult> {
    const { name } = issueNameArgs.parse(input.args);

    return this.guards.issues.withExclusive(async (store) => {
      if (!store) return recoverable(ISSUE_STORE_UNAVAILABLE);
      try {
        const issue = await store.markComplete(name);
        return success(
          {},
          `Marked issue ${formatIssueNumber(issue)} ${issue.name} as complete`,
        );
      } catch (error) {
        return issueFailure(error, 'mark issue complete');
      }
    });
  }
}

@Injectable()
@WorkflowActionProvider()
export class IssueAllCompleteAction implements WorkflowActionHandler {
  readonly name = 'issue_all_complete';
  readonly description = 'Check whether every issue is complete';
  readonly argsSchema = noArgs.shape;

  constructor(private readonly guards: ResourceGuards) {}

  async execute(): Promise<ActionResult> {
    return this.guards.issues.withShared(async (store) => {
      if (!store) return recoverable(ISSUE_STORE_UNAVAILABLE);

      const issues = await store.list();
      const pending = issues.filter((issue) => !issue.completed);
      const message =
        pending.length === 0
          ? `All ${issues.length} issues are complete`
          : `${pending.length} of ${issues.length} issues pending: ${pending
              .map((issue) => issue.name)
              .join(', ')}`;

      return success(
        {
          all_complete: pending.length === 0,
          pending_issues: pending.length,
        },
        message,
      );
    });
  }
}
