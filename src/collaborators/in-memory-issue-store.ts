import {
  IssueAlreadyExistsError,
  IssueNotFoundError,
} from '../errors/issue.errors';
import type { Issue, IssueStore } from '../interfaces/issue-store.interface';
import { validateIssueName } from '../utils/validate-issue-name';

function cloneIssue(issue: Issue): Issue {
  return { ...issue, createdAt: new Date(issue.createdAt) };
}

export class InMemoryIssueStore implements IssueStore {
  private readonly issues = new Map<string, Issue>();
  private nextNumber = 1;

  async get(name: string): Promise<Issue> {
    return cloneIssue(this.require(name));
  }

  async create(name: string, content: string): Promise<Issue> {
    const validated = validateIssueName(name);
    if (this.issues.has(validated)) {
      throw new IssueAlreadyExistsError(validated);
    }

    const issue: Issue = {
      number: this.nextNumber++,
      name: validated,
      content,
      completed: false,
      createdAt: new Date(),
    };
    this.issues.set(validated, issue);
    return cloneIssue(issue);
  }

  async update(name: string, content: string): Promise<Issue> {
    const issue = { ...this.require(name), content };
    this.issues.set(issue.name, issue);
    return cloneIssue(issue);
  }

  async markComplete(name: string): Promise<Issue> {
    const issue = { ...this.require(name), completed: true };
    this.issues.set(issue.name, issue);
    return cloneIssue(issue);
  }

  async list(): Promise<Issue[]> {
    return Array.from(this.issues.values())
      .sort((a, b) => a.number - b.number)
      .map(cloneIssue);
  }

  private require(name: string): Issue {
    const issue = this.issues.get(name.trim());
    if (!issue) {
      throw new IssueNotFoundError(name);
    }
    return issue;
  }
}
