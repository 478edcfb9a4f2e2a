import type { BuildContext, CodedConcept, ExtractedEntity, PipelineRecord } from '@notefhir/shared';
import { RegistryConfigurationError, type BuilderStructuralError } from '../errors.js';
import type { Builder, BuildResult } from './builder.js';
import { DeviceBuilder } from './device-builder.js';
import { MedicationAdministrationBuilder } from './medication-administration-builder.js';
import { MedicationRequestBuilder } from './medication-request-builder.js';
import { ObservationBuilder } from './observation-builder.js';
import { PatientBuilder } from './patient-builder.js';
import { ServiceRequestBuilder } from './service-request-builder.js';

export interface RegistryBuildOutcome {
  record: PipelineRecord;
  /** Set when the full build failed and the record is the reduced form. */
  recoveredFrom?: BuilderStructuralError;
}

/**
 * Record type → builder. Constructed once and injected; read-only after
 * construction.
 */
export class FactoryRegistry {
  private readonly builders = new Map<string, Builder>();

  constructor(builders: readonly Builder[]) {
    for (const builder of builders) {
      if (this.builders.has(builder.recordType)) {
        throw new RegistryConfigurationError(
          builder.recordType,
          `Duplicate builder for record type "${builder.recordType}"`,
        );
      }
      this.builders.set(builder.recordType, builder);
    }
  }

  get recordTypes(): string[] {
    return [...this.builders.keys()];
  }

  has(recordType: string): boolean {
    return this.builders.has(recordType);
  }

  get(recordType: string): Builder {
    const builder = this.builders.get(recordType);
    if (!builder) {
      throw new RegistryConfigurationError(recordType);
    }
    return builder;
  }

  /** Fail fast at startup rather than on the first note that needs a type. */
  assertSupports(recordTypes: readonly string[]): void {
    for (const recordType of recordTypes) {
      this.get(recordType);
    }
  }

  build(recordType: string, entity: ExtractedEntity, concept: CodedConcept, context: BuildContext): BuildResult {
    return this.get(recordType).build(entity, concept, context);
  }

  buildReduced(
    recordType: string,
    entity: ExtractedEntity,
    concept: CodedConcept,
    context: BuildContext,
  ): PipelineRecord {
    return this.get(recordType).buildReduced(entity, concept, context);
  }

  /** Full build, or the reduced form when the full build reports a structural error. */
  buildOrReduce(
    recordType: string,
    entity: ExtractedEntity,
    concept: CodedConcept,
    context: BuildContext,
  ): RegistryBuildOutcome {
    const builder = this.get(recordType);
    const result = builder.build(entity, concept, context);
    if (result.success) {
      return { record: result.record };
    }
    return {
      record: builder.buildReduced(entity, concept, context),
      recoveredFrom: result.error,
    };
  }
}

export const DEFAULT_RECORD_TYPES = [
  'Patient',
  'MedicationRequest',
  'MedicationAdministration',
  'ServiceRequest',
  'Device',
  'Observation',
] as const;

export function createDefaultRegistry(): FactoryRegistry {
  return new FactoryRegistry([
    new PatientBuilder(),
    new MedicationRequestBuilder(),
    new MedicationAdministrationBuilder(),
    new ServiceRequestBuilder(),
    new DeviceBuilder(),
    new ObservationBuilder(),
  ]);
}
