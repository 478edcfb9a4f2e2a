import type fhir4 from 'fhir/r4';
import { CODE_SYSTEMS, SNOMED_CATEGORY_CODES, toCodeableConcept } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { RecordBuilder, conceptLabel } from './record-builder.js';
import { pickCode, toFields } from './record-fields.js';

type ServiceRequestStatus = fhir4.ServiceRequest['status'];

const STATUSES: readonly ServiceRequestStatus[] = [
  'draft',
  'active',
  'on-hold',
  'revoked',
  'completed',
  'entered-in-error',
  'unknown',
];

const CATEGORIES: Record<string, fhir4.Coding> = {
  laboratory: {
    system: CODE_SYSTEMS.SNOMED,
    code: SNOMED_CATEGORY_CODES.LABORATORY_PROCEDURE,
    display: 'Laboratory procedure',
  },
  procedure: {
    system: CODE_SYSTEMS.SNOMED,
    code: SNOMED_CATEGORY_CODES.DIAGNOSTIC_PROCEDURE,
    display: 'Diagnostic procedure',
  },
};

export class ServiceRequestBuilder extends RecordBuilder {
  readonly recordType = 'ServiceRequest';

  protected referencePaths(context: BuildContext): Record<string, RecordRef | undefined> {
    return {
      subject: context.references.patient,
      requester: context.references.practitioner,
    };
  }

  protected fields(_entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    const category = context.category !== undefined ? CATEGORIES[context.category] : undefined;
    const body: Omit<fhir4.ServiceRequest, 'resourceType' | 'subject'> = {
      status: pickCode(context.status, STATUSES, 'active'),
      intent: 'order',
      category: category ? [{ coding: [{ ...category }] }] : undefined,
      code: toCodeableConcept(concept),
      authoredOn: context.recordedAt,
    };
    return toFields(body);
  }

  protected reducedFields(_entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    return toFields({
      status: pickCode(context.status, STATUSES, 'active'),
      intent: 'order',
      code: toCodeableConcept(concept),
    });
  }

  protected summary(_entity: ExtractedEntity, concept: CodedConcept): string {
    return `Service request: ${conceptLabel(concept)}`;
  }
}
