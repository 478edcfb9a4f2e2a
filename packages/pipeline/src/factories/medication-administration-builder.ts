import type fhir4 from 'fhir/r4';
import { toCodeableConcept } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { administeredDosage } from './dosage.js';
import { RecordBuilder, conceptLabel } from './record-builder.js';
import { pickCode, toFields } from './record-fields.js';

type AdministrationStatus = fhir4.MedicationAdministration['status'];

const STATUSES: readonly AdministrationStatus[] = [
  'in-progress',
  'not-done',
  'on-hold',
  'completed',
  'entered-in-error',
  'stopped',
  'unknown',
];

export class MedicationAdministrationBuilder extends RecordBuilder {
  readonly recordType = 'MedicationAdministration';

  protected referencePaths(context: BuildContext): Record<string, RecordRef | undefined> {
    return {
      subject: context.references.patient,
      request: context.references.request,
      'device.0': context.references.device,
      'performer.0.actor': context.references.practitioner,
    };
  }

  protected fields(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    const body: Omit<fhir4.MedicationAdministration, 'resourceType' | 'subject'> = {
      status: pickCode(context.status, STATUSES, 'completed'),
      medicationCodeableConcept: toCodeableConcept(concept),
      effectiveDateTime: context.recordedAt,
      dosage: administeredDosage(entity, context.modifiers),
    };
    return toFields(body);
  }

  protected reducedFields(_entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    return toFields({
      status: pickCode(context.status, STATUSES, 'completed'),
      medicationCodeableConcept: toCodeableConcept(concept),
      effectiveDateTime: context.recordedAt,
    });
  }

  protected summary(_entity: ExtractedEntity, concept: CodedConcept): string {
    return `Medication administered: ${conceptLabel(concept)}`;
  }
}
