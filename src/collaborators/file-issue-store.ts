import { mkdir, readdir, readFile, rename, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import {
  IssueAlreadyExistsError,
  IssueNotFoundError,
} from '../errors/issue.errors';
import type { Issue, IssueStore } from '../interfaces/issue-store.interface';
import { hasErrorCode } from '../utils/error-utils';
import { validateIssueName } from '../utils/validate-issue-name';
import {
  COMPLETED_ISSUES_DIR,
  ISSUE_NUMBER_WIDTH,
} from '../workflow.constants';

const ISSUE_FILE_PATTERN = new RegExp(`^(\\d{${ISSUE_NUMBER_WIDTH}})_(.+)\\.md$`);

interface IssueFile {
  number: number;
  name: string;
  filePath: string;
  completed: boolean;
}

/**
 * Issues as markdown files named `<number>_<name>.md`. Open issues live in
 * the root directory and completed ones in its `complete/` subdirectory.
 */
export class FileIssueStore implements IssueStore {
  private readonly completedDir: string;

  constructor(private readonly issuesDir: string) {
    this.completedDir = path.join(issuesDir, COMPLETED_ISSUES_DIR);
  }

  async get(name: string): Promise<Issue> {
    return this.load(await this.require(name));
  }

  async create(name: string, content: string): Promise<Issue> {
    const validated = validateIssueName(name);
    const files = await this.scan();
    if (files.some((file) => file.name === validated)) {
      throw new IssueAlreadyExistsError(validated);
    }

    const number = files.reduce((max, file) => Math.max(max, file.number), 0) + 1;
    const fileName = `${String(number).padStart(ISSUE_NUMBER_WIDTH, '0')}_${validated}.md`;
    const filePath = path.join(this.issuesDir, fileName);

    await mkdir(this.issuesDir, { recursive: true });
    await writeFile(filePath, content, 'utf-8');

    return this.load({ number, name: validated, filePath, completed: false });
  }

  async update(name: string, content: string): Promise<Issue> {
    const file = await this.require(name);
    await writeFile(file.filePath, content, 'utf-8');
    return this.load(file);
  }

  async markComplete(name: string): Promise<Issue> {
    const file = await this.require(name);
    if (file.completed) {
      return this.load(file);
    }

    const target = path.join(this.completedDir, path.basename(file.filePath));
    await mkdir(this.completedDir, { recursive: true });
    await rename(file.filePath, target);

    return this.load({ ...file, filePath: target, completed: true });
  }

  async list(): Promise<Issue[]> {
    const files = await this.scan();
    return Promise.all(files.map((file) => this.load(file)));
  }

  private async require(name: string): Promise<IssueFile> {
    const trimmed = name.trim();
    const file = (await this.scan()).find((candidate) => candidate.name === trimmed);
    if (!file) {
      throw new IssueNotFoundError(name);
    }
    return file;
  }

  private async load(file: IssueFile): Promise<Issue> {
    const [content, info] = await Promise.all([
      readFile(file.filePath, 'utf-8'),
      stat(file.filePath),
    ]);
    return {
      number: file.number,
      name: file.name,
      content,
      completed: file.completed,
      filePath: file.filePath,
      createdAt: info.birthtime,
    };
  }

  private async scan(): Promise<IssueFile[]> {
    const [open, completed] = await Promise.all([
      this.scanDir(this.issuesDir, false),
      this.scanDir(this.completedDir, true),
    ]);
    return [...open, ...completed].sort((a, b) => a.number - b.number);
  }

  private async scanDir(dir: string, completed: boolean): Promise<IssueFile[]> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const files: IssueFile[] = [];
    for (const entry of entries) {
      const match = ISSUE_FILE_PATTERN.exec(entry);
      if (!match) continue;
      files.push({
        number: Number(match[1]),
        name: match[2],
        filePath: path.join(dir, entry),
        completed,
      });
    }
    return files;
  }
}
