import type { PipelineRecord } from '@notefhir/shared';

const REQUIRED_FIELDS: Readonly<Record<string, readonly string[]>> = {
  MedicationRequest: ['status', 'intent', 'medicationCodeableConcept', 'subject'],
  MedicationAdministration: ['status', 'medicationCodeableConcept', 'subject', 'effectiveDateTime'],
  ServiceRequest: ['status', 'intent', 'code', 'subject'],
  Observation: ['status', 'code', 'subject'],
  Device: ['type'],
  Patient: [],
  Provenance: ['target', 'recorded', 'agent'],
};

export function requiredFieldsOf(recordType: string): readonly string[] {
  return REQUIRED_FIELDS[recordType] ?? [];
}

function hasValue(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return false;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/** A field is present when the body carries it or a reference is bound at or below its path. */
export function missingRequiredFields(record: Pick<PipelineRecord<unknown>, 'recordType' | 'fields' | 'references'>): string[] {
  const referencePaths = Object.keys(record.references);
  return requiredFieldsOf(record.recordType).filter((field) => {
    if (hasValue(record.fields[field])) return false;
    return !referencePaths.some((path) => path === field || path.startsWith(`${field}.`));
  });
}
