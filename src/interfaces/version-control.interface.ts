export interface VersionControl {
  currentBranch(): Promise<string>;

  /** Switch to the work branch for an issue, creating it when missing. Resolves to the branch name. */
  createWorkBranch(issueName: string): Promise<string>;

  /** Merge the issue's work branch into its merge target. Resolves to the target branch. */
  mergeBranch(issueName: string): Promise<string>;

  /** Resolve the branch an issue branch was created from. */
  findMergeTargetBranch(issueName: string): Promise<string>;

  deleteBranch(branchName: string): Promise<void>;

  /** Last commit as "hash|message|author|date". */
  lastCommitInfo(): Promise<string>;
}
