export interface MergeTargetCandidate {
  branch: string;
  /** Commits reachable from the source branch but not from the merge-base. */
  distance: number;
}

/**
 * Picks the branch an issue branch was cut from: the candidate whose
 * merge-base with the source is closest to the source tip. Ties go to trunk
 * branches in configured order, then to the alphabetically first branch.
 */
export function selectMergeTarget(
  candidates: readonly MergeTargetCandidate[],
  trunkBranches: readonly string[],
): string | undefined {
  const rank = (branch: string): number => {
    const index = trunkBranches.indexOf(branch);
    return index === -1 ? trunkBranches.length : index;
  };

  const sorted = [...candidates].sort(
    (a, b) =>
      a.distance - b.distance ||
      rank(a.branch) - rank(b.branch) ||
      a.branch.localeCompare(b.branch),
  );

  return sorted[0]?.branch;
}
