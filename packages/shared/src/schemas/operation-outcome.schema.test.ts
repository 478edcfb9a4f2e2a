import { describe, it, expect } from 'vitest';
import { OperationOutcomeSchema, issueEntryIndex } from './operation-outcome.schema.js';

describe('OperationOutcomeSchema', () => {
  it('parses an outcome and defaults a missing issue list', () => {
    const parsed = OperationOutcomeSchema.parse({ resourceType: 'OperationOutcome' });
    expect(parsed.issue).toEqual([]);
  });

  it('rejects a resource that is not an OperationOutcome', () => {
    expect(OperationOutcomeSchema.safeParse({ resourceType: 'Bundle', issue: [] }).success).toBe(false);
  });

  it('rejects an unknown severity', () => {
    const result = OperationOutcomeSchema.safeParse({
      resourceType: 'OperationOutcome',
      issue: [{ severity: 'critical', code: 'invalid' }],
    });
    expect(result.success).toBe(false);
  });
});

describe('issueEntryIndex', () => {
  it('reads the entry index from the expression', () => {
    expect(
      issueEntryIndex({
        severity: 'error',
        code: 'required',
        expression: ['Bundle.entry[2].resource.subject'],
      })
    ).toBe(2);
  });

  it('falls back to the location', () => {
    expect(
      issueEntryIndex({ severity: 'error', code: 'invalid', location: ['Bundle.entry[11]'] })
    ).toBe(11);
  });

  it('returns undefined for a bundle-level issue', () => {
    expect(issueEntryIndex({ severity: 'error', code: 'invalid', expression: ['Bundle'] })).toBeUndefined();
  });
});
