import type fhir4 from 'fhir/r4';
import { toCodeableConcept } from '@notefhir/shared';
import type { DosageModifiers, ExtractedEntity } from '@notefhir/shared';
import { parseDoseQuantity } from './quantities.js';

function instructionText(medication: ExtractedEntity, modifiers: DosageModifiers): string {
  return [medication.rawText, modifiers.dosage?.rawText, modifiers.route?.rawText, modifiers.frequency?.text]
    .filter((part): part is string => part !== undefined && part !== '')
    .join(' ');
}

/** MedicationRequest.dosageInstruction from the modifiers linked to a medication mention. */
export function dosageInstruction(
  medication: ExtractedEntity,
  modifiers: DosageModifiers | undefined,
): fhir4.Dosage[] | undefined {
  if (!modifiers || (!modifiers.dosage && !modifiers.route && !modifiers.frequency)) {
    return undefined;
  }

  const dosage: fhir4.Dosage = { text: instructionText(medication, modifiers) };
  if (modifiers.routeConcept) {
    dosage.route = toCodeableConcept(modifiers.routeConcept);
  }
  if (modifiers.frequency) {
    const timing: fhir4.Timing = { code: { text: modifiers.frequency.text } };
    if (modifiers.frequency.repeat) {
      timing.repeat = { ...modifiers.frequency.repeat };
    }
    dosage.timing = timing;
    if (modifiers.frequency.asNeeded) dosage.asNeededBoolean = true;
  }
  const dose = modifiers.dosage ? parseDoseQuantity(modifiers.dosage.rawText) : undefined;
  if (dose) {
    dosage.doseAndRate = [{ doseQuantity: dose }];
  }
  return [dosage];
}

/** MedicationAdministration.dosage: a single administered dose. */
export function administeredDosage(
  medication: ExtractedEntity,
  modifiers: DosageModifiers | undefined,
): fhir4.MedicationAdministrationDosage | undefined {
  if (!modifiers || (!modifiers.dosage && !modifiers.route)) return undefined;

  const dosage: fhir4.MedicationAdministrationDosage = {
    text: instructionText(medication, { dosage: modifiers.dosage, route: modifiers.route }),
  };
  if (modifiers.routeConcept) {
    dosage.route = toCodeableConcept(modifiers.routeConcept);
  }
  const dose = modifiers.dosage ? parseDoseQuantity(modifiers.dosage.rawText) : undefined;
  if (dose) dosage.dose = dose;
  return dosage;
}
