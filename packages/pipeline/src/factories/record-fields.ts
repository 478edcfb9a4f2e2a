import type fhir4 from 'fhir/r4';
import { CODE_SYSTEMS } from '@notefhir/shared';
import type { PipelineRecord, RecordFields } from '@notefhir/shared';

/** Copy a resource body into record fields, leaving out unset properties. */
export function toFields(body: object): RecordFields {
  return Object.fromEntries(Object.entries(body).filter(([, value]) => value !== undefined));
}

export const REDUCED_TAG: fhir4.Coding = {
  system: CODE_SYSTEMS.PIPELINE_TAGS,
  code: 'reduced',
  display: 'Reduced record',
};

export function reducedMeta(): fhir4.Meta {
  return { tag: [{ ...REDUCED_TAG }] };
}

export function isReducedRecord(record: Pick<PipelineRecord<unknown>, 'origin'>): boolean {
  return record.origin?.reduced === true;
}

/** First allowed value equal to the requested one, else the fallback. */
export function pickCode<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}
