import type fhir4 from 'fhir/r4';
import { toCodeableConcept } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { RecordBuilder, conceptLabel } from './record-builder.js';
import { toFields } from './record-fields.js';

export class DeviceBuilder extends RecordBuilder {
  readonly recordType = 'Device';

  protected referencePaths(context: BuildContext): Record<string, RecordRef | undefined> {
    return { patient: context.references.patient };
  }

  protected fields(entity: ExtractedEntity, concept: CodedConcept): RecordFields {
    const body: Omit<fhir4.Device, 'resourceType'> = {
      status: 'active',
      type: toCodeableConcept(concept),
      deviceName: [{ name: entity.rawText, type: 'user-friendly-name' }],
    };
    return toFields(body);
  }

  protected reducedFields(_entity: ExtractedEntity, concept: CodedConcept): RecordFields {
    return toFields({ type: toCodeableConcept(concept) });
  }

  protected summary(_entity: ExtractedEntity, concept: CodedConcept): string {
    return `Device: ${conceptLabel(concept)}`;
  }
}
