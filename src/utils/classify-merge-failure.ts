export type MergeFailureClass = 'irrecoverable' | 'recoverable';

/**
 * Substrings in git's merge output that mean the repository is not in a state
 * a retry can fix. git reports these only as text, so this list must follow
 * its wording.
 */
export const IRRECOVERABLE_MERGE_MARKERS: readonly string[] = [
  'does not exist',
  'deleted',
  'CONFLICT',
  'Automatic merge failed',
];

export function findIrrecoverableMarker(message: string): string | undefined {
  return IRRECOVERABLE_MERGE_MARKERS.find((marker) => message.includes(marker));
}

export function classifyMergeFailure(message: string): MergeFailureClass {
  return findIrrecoverableMarker(message) ? 'irrecoverable' : 'recoverable';
}
