export class IssueNotFoundError extends Error {
  constructor(public readonly issueName: string) {
    super(`Issue '${issueName}' not found`);
    this.name = 'IssueNotFoundError';
  }
}

export class IssueAlreadyExistsError extends Error {
  constructor(public readonly issueName: string) {
    super(`Issue '${issueName}' already exists`);
    this.name = 'IssueAlreadyExistsError';
  }
}

export class InvalidIssueNameError extends Error {
  constructor(
    public readonly issueName: string,
    reason: string,
  ) {
    super(`Invalid issue name '${issueName}': ${reason}`);
    this.name = 'InvalidIssueNameError';
  }
}
