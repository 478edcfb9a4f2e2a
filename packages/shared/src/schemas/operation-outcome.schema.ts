import { z } from 'zod';

export const OperationOutcomeIssueSchema = z.object({
  severity: z.enum(['fatal', 'error', 'warning', 'information']),
  code: z.string(),
  diagnostics: z.string().optional(),
  details: z.object({ text: z.string().optional() }).passthrough().optional(),
  expression: z.array(z.string()).optional(),
  location: z.array(z.string()).optional(),
});

export const OperationOutcomeSchema = z.object({
  resourceType: z.literal('OperationOutcome'),
  issue: z.array(OperationOutcomeIssueSchema).default([]),
});

export type OperationOutcomeIssue = z.infer<typeof OperationOutcomeIssueSchema>;
export type OperationOutcome = z.infer<typeof OperationOutcomeSchema>;

const ENTRY_INDEX_RE = /Bundle\.entry\[(\d+)\]/;

/**
 * Index of the bundle entry an issue points at, read from its FHIRPath
 * expression (preferred) or its legacy location.
 */
export function issueEntryIndex(issue: OperationOutcomeIssue): number | undefined {
  for (const path of [...(issue.expression ?? []), ...(issue.location ?? [])]) {
    const match = ENTRY_INDEX_RE.exec(path);
    if (match) return Number(match[1]);
  }
  return undefined;
}
