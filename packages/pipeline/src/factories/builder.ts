import type { BuildContext, CodedConcept, ExtractedEntity, PipelineRecord } from '@notefhir/shared';
import type { BuilderStructuralError } from '../errors.js';

export type BuildResult =
  | { success: true; record: PipelineRecord }
  | { success: false; error: BuilderStructuralError };

/**
 * One record type's factory. `build` produces the full record or reports a
 * structural problem; `buildReduced` always succeeds.
 */
export interface Builder {
  readonly recordType: string;
  build(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): BuildResult;
  buildReduced(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): PipelineRecord;
}
