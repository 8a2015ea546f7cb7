export class AbortRaisedError extends Error {
  constructor(public readonly reason: string) {
    super(`Workflow aborted: ${reason}`);
    this.name = 'AbortRaisedError';
  }
}
