import { WorkflowRunId } from '../../src/models/workflow-run-id';
import { InvalidRunIdError } from '../../src/errors/invalid-run-id.error';

describe('WorkflowRunId', () => {
  it('should create 26-character Crockford base-32 ids', () => {
    const id = WorkflowRunId.create().toString();

    expect(id).toHaveLength(26);
    expect(id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should order ids created in sequence, as values and as strings', () => {
    const ids = Array.from({ length: 1000 }, () => WorkflowRunId.create());

    for (let i = 1; i < ids.length; i++) {
      expect(ids[i - 1].compareTo(ids[i])).toBe(-1);
      expect(ids[i].compareTo(ids[i - 1])).toBe(1);
      expect(ids[i - 1].toString() < ids[i].toString()).toBe(true);
    }
  });

  it('should produce unique ids', () => {
    const ids = new Set(
      Array.from({ length: 500 }, () => WorkflowRunId.create().toString()),
    );

    expect(ids.size).toBe(500);
  });

  it('should round-trip through parse', () => {
    const id = WorkflowRunId.create();
    const parsed = WorkflowRunId.parse(id.toString());

    expect(parsed.equals(id)).toBe(true);
    expect(parsed.compareTo(id)).toBe(0);
  });

  it('should normalise lower-case input', () => {
    const id = WorkflowRunId.create();

    expect(WorkflowRunId.parse(id.toString().toLowerCase()).toString()).toBe(
      id.toString(),
    );
  });

  it('should reject malformed input', () => {
    expect(() => WorkflowRunId.parse('not-a-run-id')).toThrow(InvalidRunIdError);
    expect(() => WorkflowRunId.parse('not-a-run-id')).toThrow(
      "Invalid workflow run ID 'not-a-run-id'",
    );
    expect(() => WorkflowRunId.parse('')).toThrow("Invalid workflow run ID ''");
  });

  it('should decode its creation time', () => {
    const before = Date.now();
    const id = WorkflowRunId.create();
    const after = Date.now();

    expect(id.createdAt.getTime()).toBeGreaterThanOrEqual(before);
    expect(id.createdAt.getTime()).toBeLessThanOrEqual(after);
  });

  it('should serialise to its string form', () => {
    const id = WorkflowRunId.create();

    expect(JSON.stringify({ id })).toBe(`{"id":"${id.toString()}"}`);
  });
});
