export interface IAbortSignal {
  /** Raise the signal. The reason is embedded verbatim in failure messages. */
  raise(reason: string): Promise<void>;

  /** Resolves to the abort reason when raised, or null. */
  isRaised(): Promise<string | null>;

  /**
   * Remove a raised signal. Never rejects: a missing marker is success and
   * other failures are logged. Resolves to true when a marker was removed.
   */
  clear(): Promise<boolean>;
}
