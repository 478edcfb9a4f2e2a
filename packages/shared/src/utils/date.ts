import { formatISO, isValid, parseISO } from 'date-fns';

/**
 * Format a Date as a FHIR-compatible dateTime string (ISO 8601).
 */
export function toFhirDateTime(date: Date): string {
  return formatISO(date);
}

/**
 * True when the value is a FHIR dateTime with at least a full date
 * (`2026-02-20`, `2026-02-20T08:00:00Z`, ...).
 */
export function isFhirDateTime(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2}))?$/.test(value)) {
    return false;
  }
  return isValid(parseISO(value));
}
