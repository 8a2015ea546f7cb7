import type { IssueStore } from '../interfaces/issue-store.interface';
import type { VersionControl } from '../interfaces/version-control.interface';
import { ExclusiveGuard } from './exclusive-guard';
import { SharedExclusiveGuard } from './shared-exclusive-guard';

export const ISSUE_STORE_GUARD = 'issue-store';
export const VERSION_CONTROL_GUARD = 'version-control';

/**
 * The two long-lived shared resources actions touch. When both are needed the
 * issue-store guard is taken first and released before the version-control
 * guard is acquired; holding both at once is rejected.
 */
export class ResourceGuards {
  readonly issues: SharedExclusiveGuard<IssueStore>;
  readonly git: ExclusiveGuard<VersionControl>;

  constructor(issueStore?: IssueStore, versionControl?: VersionControl) {
    this.issues = new SharedExclusiveGuard(ISSUE_STORE_GUARD, issueStore, {
      mustNotHold: [VERSION_CONTROL_GUARD],
    });
    this.git = new ExclusiveGuard(VERSION_CONTROL_GUARD, versionControl, {
      mustNotHold: [ISSUE_STORE_GUARD],
    });
  }
}
