export const AGENT_WORKFLOW_OPTIONS = 'AGENT_WORKFLOW_OPTIONS';
export const AGENT_WORKFLOW_RAW_OPTIONS = 'AGENT_WORKFLOW_RAW_OPTIONS';
export const ABORT_SIGNAL = 'AGENT_WORKFLOW_ABORT_SIGNAL';
export const RUN_STORAGE_ADAPTER = 'AGENT_WORKFLOW_RUN_STORAGE_ADAPTER';
export const TEMPLATE_RENDERER = 'AGENT_WORKFLOW_TEMPLATE_RENDERER';
export const INITIAL_WORKFLOWS = 'AGENT_WORKFLOW_INITIAL_WORKFLOWS';

export const WORKFLOW_PROVIDER_METADATA = 'agent-workflows:workflow-provider';
export const ACTION_PROVIDER_METADATA = 'agent-workflows:action-provider';

export const DEFAULT_MAX_TRANSITIONS = 1000;
export const DEFAULT_ABORT_FILE = '.agent-workflows/.abort';
export const DEFAULT_TRUNK_BRANCHES: readonly string[] = ['main', 'master'];
export const DEFAULT_ISSUES_DIR = 'issues';
export const COMPLETED_ISSUES_DIR = 'complete';

export const ISSUE_BRANCH_PREFIX = 'issue/';
export const ISSUE_NUMBER_WIDTH = 6;
export const MAX_ISSUE_NAME_LENGTH = 100;

/** Context variable set after every action: true on success, false on a recoverable failure. */
export const SUCCESS_VARIABLE = 'success';
/** Context variable holding the message of the last recoverable failure. */
export const LAST_ERROR_VARIABLE = 'last_error';
