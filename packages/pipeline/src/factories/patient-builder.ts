import type fhir4 from 'fhir/r4';
import type { ExtractedEntity, RecordFields, RecordRef } from '@notefhir/shared';
import { RecordBuilder } from './record-builder.js';
import { toFields } from './record-fields.js';

function humanName(rawText: string): fhir4.HumanName | undefined {
  const parts = rawText.trim().split(/\s+/).filter(Boolean);
  const family = parts.at(-1);
  if (family === undefined) return undefined;
  const name: fhir4.HumanName = { text: parts.join(' '), family };
  if (parts.length > 1) name.given = parts.slice(0, -1);
  return name;
}

export class PatientBuilder extends RecordBuilder {
  readonly recordType = 'Patient';

  protected referencePaths(): Record<string, RecordRef | undefined> {
    return {};
  }

  protected fields(entity: ExtractedEntity): RecordFields {
    const name = humanName(entity.rawText);
    const body: Omit<fhir4.Patient, 'resourceType'> = {
      active: true,
      name: name ? [name] : undefined,
    };
    return toFields(body);
  }

  protected reducedFields(entity: ExtractedEntity): RecordFields {
    const name = humanName(entity.rawText);
    return toFields({ name: name ? [name] : undefined });
  }

  protected summary(entity: ExtractedEntity): string {
    const name = entity.rawText.trim();
    return name ? `Patient ${name}` : 'Unidentified patient';
  }
}
