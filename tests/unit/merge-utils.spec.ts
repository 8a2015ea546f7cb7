import { selectMergeTarget } from '../../src/utils/select-merge-target';
import {
  classifyMergeFailure,
  findIrrecoverableMarker,
} from '../../src/utils/classify-merge-failure';
import { formatCommitInfo } from '../../src/utils/format-commit-info';

describe('selectMergeTarget', () => {
  const trunks = ['main', 'master'];

  it('should pick the branch the source was cut from', () => {
    expect(
      selectMergeTarget(
        [
          { branch: 'main', distance: 5 },
          { branch: 'release/2', distance: 2 },
          { branch: 'develop', distance: 4 },
        ],
        trunks,
      ),
    ).toBe('release/2');
  });

  it('should prefer trunk branches on a tie', () => {
    expect(
      selectMergeTarget(
        [
          { branch: 'feature', distance: 1 },
          { branch: 'master', distance: 1 },
          { branch: 'main', distance: 1 },
        ],
        trunks,
      ),
    ).toBe('main');
  });

  it('should fall back to alphabetical order between non-trunk branches', () => {
    expect(
      selectMergeTarget(
        [
          { branch: 'zeta', distance: 3 },
          { branch: 'alpha', distance: 3 },
        ],
        trunks,
      ),
    ).toBe('alpha');
  });

  it('should return undefined without candidates', () => {
    expect(selectMergeTarget([], trunks)).toBeUndefined();
  });
});

describe('classifyMergeFailure', () => {
  it.each([
    "Source branch 'issue/x' does not exist",
    'branch was deleted',
    'CONFLICT (content): Merge conflict in src/app.ts',
    'Automatic merge failed; fix conflicts and then commit the result.',
  ])('should classify "%s" as irrecoverable', (message) => {
    expect(classifyMergeFailure(message)).toBe('irrecoverable');
  });

  it('should classify other failures as recoverable', () => {
    expect(
      classifyMergeFailure("Unable to create '.git/index.lock': File exists."),
    ).toBe('recoverable');
  });

  it('should report which marker matched', () => {
    expect(findIrrecoverableMarker('CONFLICT in a.txt')).toBe('CONFLICT');
    expect(findIrrecoverableMarker('timeout')).toBeUndefined();
  });
});

describe('formatCommitInfo', () => {
  it('should shorten the hash and label each part', () => {
    expect(
      formatCommitInfo(
        'abcdef1234567890|Merge issue/fix into main|Test Author|Mon Jan 1 2024',
      ),
    ).toBe(
      '\n\nMerge commit: abcdef12\nMessage: Merge issue/fix into main\nAuthor: Test Author\nDate: Mon Jan 1 2024',
    );
  });

  it('should keep pipes inside the commit subject', () => {
    expect(formatCommitInfo('1234567890|a | b|Author|Date')).toBe(
      '\n\nMerge commit: 12345678\nMessage: a | b\nAuthor: Author\nDate: Date',
    );
  });

  it('should pass through unexpected formats', () => {
    expect(formatCommitInfo('abc123')).toBe('\n\nMerge commit: abc123');
  });
});
