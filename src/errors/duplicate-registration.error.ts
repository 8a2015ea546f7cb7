export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly kind: 'workflow' | 'action',
    public readonly registeredName: string,
    public readonly source1: string,
    public readonly source2: string,
  ) {
    super(
      `Duplicate ${kind} name "${registeredName}". ` +
        `Both ${source1} and ${source2} register the same name.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
