import { generatedNarrative } from '@notefhir/shared';
import type {
  BuildContext,
  CodedConcept,
  ExtractedEntity,
  PipelineRecord,
  RecordFields,
  RecordRef,
} from '@notefhir/shared';
import { BuilderStructuralError } from '../errors.js';
import type { Builder, BuildResult } from './builder.js';
import { describeRef, partitionReferences } from './references.js';
import { reducedMeta, toFields } from './record-fields.js';

/**
 * Shared two-tier flow for the record builders. Subclasses declare which
 * context references land on which field paths and how the body is filled.
 */
export abstract class RecordBuilder implements Builder {
  abstract readonly recordType: string;

  protected abstract referencePaths(context: BuildContext): Record<string, RecordRef | undefined>;

  protected abstract fields(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): RecordFields;

  /** Required fields only. */
  protected abstract reducedFields(
    entity: ExtractedEntity,
    concept: CodedConcept,
    context: BuildContext,
  ): RecordFields;

  protected abstract summary(entity: ExtractedEntity, concept: CodedConcept): string;

  build(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): BuildResult {
    const { resolved, unresolved } = partitionReferences(
      this.referencePaths(context),
      context.knownLocalKeys,
    );
    const [first] = unresolved;
    if (first) {
      return {
        success: false,
        error: new BuilderStructuralError(this.recordType, first.path, describeRef(first.ref)),
      };
    }

    return {
      success: true,
      record: {
        recordType: this.recordType,
        localKey: context.localKey,
        fields: this.fields(entity, concept, context),
        references: resolved,
        origin: { entity, concept, context, reduced: false },
      },
    };
  }

  buildReduced(entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): PipelineRecord {
    const { resolved } = partitionReferences(this.referencePaths(context), context.knownLocalKeys);
    return {
      recordType: this.recordType,
      localKey: context.localKey,
      fields: {
        ...this.reducedFields(entity, concept, context),
        ...toFields({
          meta: reducedMeta(),
          text: generatedNarrative(this.summary(entity, concept)),
        }),
      },
      references: resolved,
      origin: { entity, concept, context, reduced: true },
    };
  }
}

export function conceptLabel(concept: CodedConcept): string {
  return concept.display || concept.text;
}
