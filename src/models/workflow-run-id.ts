import { decodeTime, monotonicFactory } from 'ulid';
import { InvalidRunIdError } from '../errors/invalid-run-id.error';

// Crockford base-32, first character bounded by the 48-bit time component.
const ULID_PATTERN = /^[0-7][0-9A-HJKMNP-TV-Z]{25}$/;

const nextUlid = monotonicFactory();

/**
 * Sortable run identifier. Ids created in program order compare in that
 * order, as values and as strings, even within the same millisecond.
 */
export class WorkflowRunId {
  private constructor(private readonly value: string) {}

  static create(): WorkflowRunId {
    return new WorkflowRunId(nextUlid());
  }

  static parse(input: string): WorkflowRunId {
    const normalized = input.trim().toUpperCase();
    if (!ULID_PATTERN.test(normalized)) {
      throw new InvalidRunIdError(input);
    }
    return new WorkflowRunId(normalized);
  }

  get createdAt(): Date {
    return new Date(decodeTime(this.value));
  }

  compareTo(other: WorkflowRunId): number {
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }

  equals(other: WorkflowRunId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
