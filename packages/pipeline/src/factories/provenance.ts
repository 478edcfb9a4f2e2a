import type fhir4 from 'fhir/r4';
import { CODE_SYSTEMS } from '@notefhir/shared';
import type { PipelineRecord, RecordRef } from '@notefhir/shared';
import { toFields } from './record-fields.js';

export interface ProvenanceInput {
  localKey: string;
  targets: readonly RecordRef[];
  recordedAt: string;
  requestId?: string;
}

/**
 * Provenance naming every record of the bundle as a target. Built directly
 * by the planner; it has no source entity to rebuild from.
 */
export function buildProvenanceRecord(input: ProvenanceInput): PipelineRecord {
  const body: Omit<fhir4.Provenance, 'resourceType' | 'target'> = {
    recorded: input.recordedAt,
    activity: {
      coding: [
        {
          system: 'http://terminology.hl7.org/CodeSystem/v3-DataOperation',
          code: 'CREATE',
          display: 'create',
        },
      ],
    },
    agent: [
      {
        type: {
          coding: [
            {
              system: CODE_SYSTEMS.PROVENANCE_PARTICIPANT,
              code: 'assembler',
              display: 'Assembler',
            },
          ],
        },
        who: { display: 'notefhir pipeline' },
      },
    ],
    reason: input.requestId ? [{ text: `Clinical note conversion ${input.requestId}` }] : undefined,
  };

  const references: Record<string, RecordRef> = {};
  input.targets.forEach((ref, i) => {
    references[`target.${i}`] = ref;
  });

  return {
    recordType: 'Provenance',
    localKey: input.localKey,
    fields: toFields(body),
    references,
  };
}
