import { execFile } from 'child_process';
import { promisify } from 'util';
import { Logger } from '@nestjs/common';
import { GitOperationError } from '../errors/git-operation.error';
import type { VersionControl } from '../interfaces/version-control.interface';
import { errorMessage } from '../utils/error-utils';
import {
  MergeTargetCandidate,
  selectMergeTarget,
} from '../utils/select-merge-target';
import {
  DEFAULT_TRUNK_BRANCHES,
  ISSUE_BRANCH_PREFIX,
} from '../workflow.constants';

const execFileAsync = promisify(execFile);

export interface GitCommandOutput {
  stdout: string;
  stderr: string;
}

/** Runs `git <args>` in `cwd`; rejects with GitCommandError on a non-zero exit. */
export type GitCommandRunner = (
  args: readonly string[],
  cwd: string,
) => Promise<GitCommandOutput>;

export class GitCommandError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(
      [stderr.trim(), stdout.trim()].filter(Boolean).join('\n') ||
        `git ${args.join(' ')} failed`,
    );
    this.name = 'GitCommandError';
  }
}

function readOutput(error: unknown, key: 'stdout' | 'stderr'): string {
  const value: unknown =
    typeof error === 'object' && error !== null
      ? Reflect.get(error, key)
      : undefined;
  return typeof value === 'string' ? value : '';
}

export const execGit: GitCommandRunner = async (args, cwd) => {
  try {
    const { stdout, stderr } = await execFileAsync('git', [...args], {
      cwd,
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (error) {
    const stderr = readOutput(error, 'stderr') || errorMessage(error);
    throw new GitCommandError(args, readOutput(error, 'stdout'), stderr);
  }
};

export interface GitCliVersionControlOptions {
  /** Repository working directory. */
  cwd: string;
  /** Preferred merge targets when ancestry does not decide. Default: ['main', 'master'] */
  trunkBranches?: readonly string[];
  runner?: GitCommandRunner;
}

/**
 * Version control through the git executable. The working tree is process-wide
 * state, so callers must serialise access (see ResourceGuards).
 */
export class GitCliVersionControl implements VersionControl {
  private readonly logger = new Logger(GitCliVersionControl.name);
  private readonly cwd: string;
  private readonly trunkBranches: readonly string[];
  private readonly runner: GitCommandRunner;

  constructor(options: GitCliVersionControlOptions) {
    this.cwd = options.cwd;
    this.trunkBranches = options.trunkBranches ?? DEFAULT_TRUNK_BRANCHES;
    this.runner = options.runner ?? execGit;
  }

  static issueBranchName(issueName: string): string {
    return `${ISSUE_BRANCH_PREFIX}${issueName}`;
  }

  async currentBranch(): Promise<string> {
    return this.git('current branch', ['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async createWorkBranch(issueName: string): Promise<string> {
    const branch = GitCliVersionControl.issueBranchName(issueName);

    if ((await this.currentBranch()) === branch) {
      return branch;
    }

    if (await this.branchExists(branch)) {
      await this.git('switch branch', ['checkout', branch]);
    } else {
      await this.git('create work branch', ['checkout', '-b', branch]);
    }
    return branch;
  }

  async mergeBranch(issueName: string): Promise<string> {
    const source = GitCliVersionControl.issueBranchName(issueName);

    if (!(await this.branchExists(source))) {
      throw new GitOperationError(
        'merge branch',
        `Source branch '${source}' does not exist`,
      );
    }

    const target = await this.findMergeTargetBranch(issueName);
    await this.git('checkout merge target', ['checkout', target]);

    try {
      await this.runner(
        ['merge', '--no-ff', source, '-m', `Merge ${source} into ${target}`],
        this.cwd,
      );
    } catch (error) {
      await this.abortMerge();
      throw new GitOperationError(
        'merge branch',
        `Failed to merge '${source}' into '${target}': ${errorMessage(error)}`,
      );
    }

    return target;
  }

  async findMergeTargetBranch(issueName: string): Promise<string> {
    const source = GitCliVersionControl.issueBranchName(issueName);
    const branches = await this.localBranches();

    if (!branches.includes(source)) {
      throw new GitOperationError(
        'find merge target',
        `Source branch '${source}' does not exist`,
      );
    }

    const candidates: MergeTargetCandidate[] = [];
    for (const branch of branches) {
      if (branch === source || branch.startsWith(ISSUE_BRANCH_PREFIX)) {
        continue;
      }

      const mergeBase = await this.tryGit(['merge-base', source, branch]);
      if (!mergeBase) continue;

      const distance = await this.git('count commits', [
        'rev-list',
        '--count',
        `${mergeBase}..${source}`,
      ]);
      candidates.push({ branch, distance: Number(distance) });
    }

    const selected =
      selectMergeTarget(candidates, this.trunkBranches) ??
      this.trunkBranches.find((trunk) => branches.includes(trunk));

    if (!selected) {
      throw new GitOperationError(
        'find merge target',
        `Unable to determine a merge target for '${source}'`,
      );
    }
    return selected;
  }

  async deleteBranch(branchName: string): Promise<void> {
    await this.git('delete branch', ['branch', '-D', branchName]);
  }

  async lastCommitInfo(): Promise<string> {
    return this.git('read last commit', [
      'log',
      '-1',
      '--pretty=format:%H|%s|%an|%ad',
    ]);
  }

  private async localBranches(): Promise<string[]> {
    const output = await this.git('list branches', [
      'for-each-ref',
      '--format=%(refname:short)',
      'refs/heads/',
    ]);
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  private async branchExists(branch: string): Promise<boolean> {
    return (
      (await this.tryGit(['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`])) !==
      undefined
    );
  }

  private async abortMerge(): Promise<void> {
    try {
      await this.runner(['merge', '--abort'], this.cwd);
    } catch (error) {
      this.logger.warn(`git merge --abort failed: ${errorMessage(error)}`);
    }
  }

  private async git(operation: string, args: readonly string[]): Promise<string> {
    try {
      const { stdout } = await this.runner(args, this.cwd);
      return stdout.trim();
    } catch (error) {
      throw new GitOperationError(operation, errorMessage(error));
    }
  }

  private async tryGit(args: readonly string[]): Promise<string | undefined> {
    try {
      const { stdout } = await this.runner(args, this.cwd);
      return stdout.trim();
    } catch (error) {
      if (error instanceof GitCommandError) {
        return undefined;
      }
      throw error;
    }
  }
}
