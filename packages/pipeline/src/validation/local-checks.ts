import { PLACEHOLDER_CODE_PATTERN, isConcreteReference, isFhirDateTime } from '@notefhir/shared';
import type { AssembledBundle, BundleEntry, ValidationIssue } from '@notefhir/shared';
import { missingRequiredFields } from './required-fields.js';

function issue(
  code: ValidationIssue['code'],
  entryIndex: number,
  path: string,
  message: string,
): ValidationIssue {
  return { severity: 'error', code, source: 'local', entryIndex, path, message };
}

export function checkRequiredFields(entry: BundleEntry, entryIndex: number): ValidationIssue[] {
  const { recordType } = entry.record;
  return missingRequiredFields(entry.record).map((field) =>
    issue('required', entryIndex, `${recordType}.${field}`, `${recordType} is missing required field "${field}"`),
  );
}

/** Bundle references must point at this entry or an earlier one. */
export function checkReferences(
  entry: BundleEntry,
  entryIndex: number,
  positions: ReadonlyMap<string, number>,
): ValidationIssue[] {
  const { recordType } = entry.record;
  const issues: ValidationIssue[] = [];
  for (const [path, ref] of Object.entries(entry.record.references)) {
    if (ref.kind === 'concrete') {
      if (!isConcreteReference(ref.reference)) {
        issues.push(
          issue('reference', entryIndex, `${recordType}.${path}`, `"${ref.reference}" is not a resolvable reference`),
        );
      }
      continue;
    }
    const target = positions.get(ref.internalId);
    if (target === undefined) {
      issues.push(
        issue('reference', entryIndex, `${recordType}.${path}`, `No entry carries internal id ${ref.internalId}`),
      );
    } else if (target > entryIndex) {
      issues.push(
        issue('reference', entryIndex, `${recordType}.${path}`, `Reference to entry ${target} appears before it`),
      );
    }
  }
  return issues;
}

const DATE_TIME_FIELDS = ['authoredOn', 'effectiveDateTime', 'recorded'] as const;

export function checkDateTimes(entry: BundleEntry, entryIndex: number): ValidationIssue[] {
  const { recordType, fields } = entry.record;
  return DATE_TIME_FIELDS.flatMap((field) => {
    const value = fields[field];
    if (value === undefined || (typeof value === 'string' && isFhirDateTime(value))) return [];
    return [issue('structure', entryIndex, `${recordType}.${field}`, `${field} is not a FHIR dateTime`)];
  });
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function checkConcept(
  concept: Record<string, unknown>,
  entryIndex: number,
  path: string,
  issues: ValidationIssue[],
): void {
  const { coding, text } = concept;
  const codings = Array.isArray(coding) ? coding : [];
  if (codings.length === 0 && !(typeof text === 'string' && text.length > 0)) {
    issues.push(issue('coding', entryIndex, path, 'Concept has neither a coding nor text'));
  }
  codings.forEach((item: unknown, i) => {
    const at = `${path}.coding.${i}`;
    if (!isObject(item)) {
      issues.push(issue('coding', entryIndex, at, 'Coding is not an object'));
      return;
    }
    if (typeof item.system !== 'string' || item.system === '') {
      issues.push(issue('coding', entryIndex, at, 'Coding has no system'));
    }
    if (typeof item.code !== 'string' || item.code === '') {
      issues.push(issue('coding', entryIndex, at, 'Coding has no code'));
    } else if (PLACEHOLDER_CODE_PATTERN.test(item.code)) {
      issues.push(issue('coding', entryIndex, at, `Placeholder code "${item.code}"`));
    }
  });
}

/** Every object carrying a `coding` property is checked as a CodeableConcept. */
export function checkCodings(entry: BundleEntry, entryIndex: number): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const walk = (value: unknown, path: string): void => {
    if (Array.isArray(value)) {
      value.forEach((item: unknown, i) => walk(item, `${path}.${i}`));
      return;
    }
    if (!isObject(value)) return;
    if ('coding' in value) {
      checkConcept(value, entryIndex, path, issues);
    }
    for (const [key, child] of Object.entries(value)) {
      if (key !== 'coding') walk(child, `${path}.${key}`);
    }
  };
  for (const [key, value] of Object.entries(entry.record.fields)) {
    walk(value, `${entry.record.recordType}.${key}`);
  }
  return issues;
}

export function runLocalChecks(bundle: AssembledBundle): ValidationIssue[] {
  const positions = new Map(bundle.entries.map((entry, i) => [entry.internalId, i]));
  return bundle.entries.flatMap((entry, i) => [
    ...checkRequiredFields(entry, i),
    ...checkReferences(entry, i, positions),
    ...checkCodings(entry, i),
    ...checkDateTimes(entry, i),
  ]);
}
