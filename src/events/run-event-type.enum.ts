export enum RunEventType {
  CREATED = 'run.created',
  TRANSITION = 'run.transition',
  FINISHED = 'run.finished',
  ACTION_FAILED = 'run.action.failed',
}
