/**
 * Tie-break precedence for entries whose dependency order is otherwise free:
 * identity, then orders, then administration and devices, then observations.
 */
const CATEGORY_BY_TYPE = new Map<string, number>([
  ['Patient', 0],
  ['Practitioner', 0],
  ['Organization', 0],
  ['RelatedPerson', 0],
  ['MedicationRequest', 1],
  ['ServiceRequest', 1],
  ['MedicationAdministration', 2],
  ['Device', 2],
  ['DeviceUseStatement', 2],
  ['Procedure', 2],
  ['Observation', 3],
  ['DiagnosticReport', 3],
]);

export const OTHER_CATEGORY = 4;

export function categoryOf(recordType: string): number {
  return CATEGORY_BY_TYPE.get(recordType) ?? OTHER_CATEGORY;
}
