import { describe, it, expect } from 'vitest';
import { CODE_SYSTEMS } from '@notefhir/shared';
import type { BuildContext, CodedConcept, ExtractedEntity } from '@notefhir/shared';
import { BuilderStructuralError, RegistryConfigurationError } from '../errors.js';
import { DEFAULT_RECORD_TYPES, FactoryRegistry, createDefaultRegistry } from './factory-registry.js';
import { PatientBuilder } from './patient-builder.js';
import { REDUCED_TAG } from './record-fields.js';
import { concreteRef, localRef } from './references.js';

const metforminEntity: ExtractedEntity = {
  kind: 'Medication',
  rawText: 'Metformin',
  normalizedText: 'metformin',
  sourceOffset: { start: 0, end: 9 },
  confidence: 0.9,
  rule: 'medication-lexicon',
};

const metformin: CodedConcept = {
  system: CODE_SYSTEMS.RXNORM,
  code: '6809',
  display: 'Metformin',
  text: 'metformin',
};

function context(overrides: Partial<BuildContext> = {}): BuildContext {
  return {
    localKey: 'medication-0',
    references: {},
    knownLocalKeys: new Set(['patient-0', 'medication-0']),
    recordedAt: '2026-02-20T08:00:00Z',
    ...overrides,
  };
}

describe('FactoryRegistry', () => {
  const registry = createDefaultRegistry();

  it('registers a builder for every default record type', () => {
    expect(registry.recordTypes.sort()).toEqual([...DEFAULT_RECORD_TYPES].sort());
    expect(() => registry.assertSupports(DEFAULT_RECORD_TYPES)).not.toThrow();
  });

  it('raises a configuration error for an unregistered record type', () => {
    expect(() => registry.assertSupports(['Encounter'])).toThrow(RegistryConfigurationError);
    expect(() => registry.get('Encounter')).toThrow('No builder registered for record type "Encounter"');
  });

  it('rejects two builders for one record type', () => {
    expect(() => new FactoryRegistry([new PatientBuilder(), new PatientBuilder()])).toThrow(
      'Duplicate builder for record type "Patient"',
    );
  });

  it('builds a full record with local and concrete references', () => {
    const result = registry.build(
      'MedicationRequest',
      metforminEntity,
      metformin,
      context({
        references: { patient: localRef('patient-0'), practitioner: concreteRef('Practitioner/7') },
      }),
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.record.recordType).toBe('MedicationRequest');
    expect(result.record.localKey).toBe('medication-0');
    expect(result.record.references).toEqual({
      subject: { kind: 'local', localKey: 'patient-0' },
      requester: { kind: 'concrete', reference: 'Practitioner/7' },
    });
    expect(result.record.fields).toEqual({
      status: 'active',
      intent: 'order',
      medicationCodeableConcept: {
        coding: [{ system: CODE_SYSTEMS.RXNORM, code: '6809', display: 'Metformin' }],
        text: 'metformin',
      },
      authoredOn: '2026-02-20T08:00:00Z',
    });
    expect(result.record.origin?.reduced).toBe(false);
  });

  it('reports a local key that is not planned as a structural error', () => {
    const result = registry.build(
      'MedicationRequest',
      metforminEntity,
      metformin,
      context({ references: { patient: localRef('patient-9') } }),
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(BuilderStructuralError);
    expect(result.error.path).toBe('subject');
    expect(result.error.message).toBe(
      'MedicationRequest.subject: local key "patient-9" is not planned in this bundle',
    );
  });

  it('falls back to the reduced builder and keeps only resolvable references', () => {
    const outcome = registry.buildOrReduce(
      'MedicationRequest',
      metforminEntity,
      metformin,
      context({
        references: { patient: localRef('patient-0'), practitioner: concreteRef('dr smith') },
      }),
    );

    expect(outcome.recoveredFrom?.path).toBe('requester');
    expect(outcome.record.references).toEqual({
      subject: { kind: 'local', localKey: 'patient-0' },
    });
    expect(outcome.record.fields).toEqual({
      status: 'active',
      intent: 'order',
      medicationCodeableConcept: {
        coding: [{ system: CODE_SYSTEMS.RXNORM, code: '6809', display: 'Metformin' }],
        text: 'metformin',
      },
      meta: { tag: [REDUCED_TAG] },
      text: {
        status: 'generated',
        div: '<div xmlns="http://www.w3.org/1999/xhtml">Medication order: Metformin</div>',
      },
    });
    expect(outcome.record.origin?.reduced).toBe(true);
  });

  it('returns no recovery marker when the full build succeeds', () => {
    const outcome = registry.buildOrReduce('Device', metforminEntity, metformin, context());
    expect(outcome.recoveredFrom).toBeUndefined();
  });

  it('is pure: the same input builds the same record', () => {
    const ctx = context({ references: { patient: localRef('patient-0') } });
    expect(registry.build('MedicationRequest', metforminEntity, metformin, ctx)).toEqual(
      registry.build('MedicationRequest', metforminEntity, metformin, ctx),
    );
  });
});
