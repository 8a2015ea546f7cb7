export class TransitionLimitExceededError extends Error {
  constructor(
    public readonly runId: string,
    public readonly limit: number,
  ) {
    super(
      `Transition limit (${limit}) exceeded for workflow run ${runId}. ` +
        `Check for transition cycles that never reach a terminal state.`,
    );
    this.name = 'TransitionLimitExceededError';
  }
}
