import type fhir4 from 'fhir/r4';
import { CODE_SYSTEMS, toCodeableConcept } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { collapseWhitespace, normalizeForMatching } from '../extraction/normalize.js';
import { parseVitalReading } from './quantities.js';
import { RecordBuilder, conceptLabel } from './record-builder.js';
import { pickCode, toFields } from './record-fields.js';

type ObservationStatus = fhir4.Observation['status'];

const STATUSES: readonly ObservationStatus[] = [
  'registered',
  'preliminary',
  'final',
  'amended',
  'corrected',
  'cancelled',
  'entered-in-error',
  'unknown',
];

const CATEGORY_DISPLAY: Record<string, string> = {
  'vital-signs': 'Vital Signs',
  laboratory: 'Laboratory',
};

const SYSTOLIC: fhir4.CodeableConcept = {
  coding: [{ system: CODE_SYSTEMS.LOINC, code: '8480-6', display: 'Systolic blood pressure' }],
};
const DIASTOLIC: fhir4.CodeableConcept = {
  coding: [{ system: CODE_SYSTEMS.LOINC, code: '8462-4', display: 'Diastolic blood pressure' }],
};

/** The part of a reading after the vital name: "BP 120/80 mmHg" → "120/80 mmhg". */
function valueText(entity: ExtractedEntity): string {
  const reading = collapseWhitespace(normalizeForMatching(entity.rawText));
  return reading.startsWith(entity.normalizedText)
    ? reading.slice(entity.normalizedText.length)
    : reading;
}

function readingFields(
  entity: ExtractedEntity,
  concept: CodedConcept,
): Pick<fhir4.Observation, 'valueQuantity' | 'component'> {
  const reading = parseVitalReading(valueText(entity), concept.code);
  if (!reading) return {};
  if (reading.kind === 'single') return { valueQuantity: reading.value };
  return {
    component: [
      { code: SYSTOLIC, valueQuantity: reading.systolic },
      { code: DIASTOLIC, valueQuantity: reading.diastolic },
    ],
  };
}

export class ObservationBuilder extends RecordBuilder {
  readonly recordType = 'Observation';

  protected referencePaths(context: BuildContext): Record<string, RecordRef | undefined> {
    return {
      subject: context.references.patient,
      'performer.0': context.references.practitioner,
    };
  }

  protected fields(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    const category = context.category ?? 'vital-signs';
    const body: Omit<fhir4.Observation, 'resourceType' | 'subject'> = {
      status: pickCode(context.status, STATUSES, 'final'),
      category: [
        {
          coding: [
            {
              system: CODE_SYSTEMS.OBSERVATION_CATEGORY,
              code: category,
              display: CATEGORY_DISPLAY[category],
            },
          ],
        },
      ],
      code: toCodeableConcept(concept),
      effectiveDateTime: context.recordedAt,
      ...readingFields(entity, concept),
    };
    return toFields(body);
  }

  protected reducedFields(_entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields {
    return toFields({
      status: pickCode(context.status, STATUSES, 'final'),
      code: toCodeableConcept(concept),
    });
  }

  protected summary(entity: ExtractedEntity, concept: CodedConcept): string {
    return `Observation: ${conceptLabel(concept)} (${entity.rawText})`;
  }
}
