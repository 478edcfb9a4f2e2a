import type fhir4 from 'fhir/r4';
import { toCodeableConcept } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { dosageInstruction } from './dosage.js';
import { RecordBuilder, conceptLabel } from './record-builder.js';
import { pickCode, toFields } from './record-fields.js';

type MedicationRequestStatus = fhir4.MedicationRequest['status'];

const STATUSES: readonly MedicationRequestStatus[] = [
  'active',
  'on-hold',
  'cancelled',
  'completed',
  'entered-in-error',
  'stopped',
  'draft',
  'unknown',
];

export class MedicationRequestBuilder extends RecordBuilder {
  readonly recordType = 'MedicationRequest';

  protected referencePaths(context: BuildContext): Record<string, RecordRef | undefined> {
    return {
      subject: context.references.patient,
      requester: context.references.practitioner,
    };
  }

  protected fields(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    const body: Omit<fhir4.MedicationRequest, 'resourceType' | 'subject'> = {
      status: pickCode(context.status, STATUSES, 'active'),
      intent: 'order',
      medicationCodeableConcept: toCodeableConcept(concept),
      authoredOn: context.recordedAt,
      dosageInstruction: dosageInstruction(entity, context.modifiers),
    };
    return toFields(body);
  }

  protected reducedFields(_entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    return toFields({
      status: pickCode(context.status, STATUSES, 'active'),
      intent: 'order',
      medicationCodeableConcept: toCodeableConcept(concept),
    });
  }

  protected summary(_entity: ExtractedEntity, concept: CodedConcept): string {
    return `Medication order: ${conceptLabel(concept)}`;
  }
}
