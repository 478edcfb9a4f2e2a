import { describe, it, expect, vi } from 'vitest';
import { CODE_SYSTEMS, fallbackConcept } from '@notefhir/shared';
import type {
  BuildContext,
  CodedConcept,
  ExtractedEntity,
  FhirTransactionBundle,
  OperationOutcome,
  PipelineRecord,
} from '@notefhir/shared';
import type { RemoteValidationResult, RemoteValidator } from '../adapters/fhir-validator-client.js';
import { BundleAssembler } from '../assembly/bundle-assembler.js';
import { createDefaultRegistry } from '../factories/factory-registry.js';
import { reducedMeta } from '../factories/record-fields.js';
import { localRef } from '../factories/references.js';
import { ValidationOrchestrator } from './validation-orchestrator.js';

const registry = createDefaultRegistry();
const knownLocalKeys = new Set(['patient-0', 'medication-0']);

function entity(kind: ExtractedEntity['kind'], rawText: string): ExtractedEntity {
  return {
    kind,
    rawText,
    normalizedText: rawText.toLowerCase(),
    sourceOffset: { start: 0, end: rawText.length },
    confidence: 0.9,
    rule: 'test',
  };
}

function built(recordType: string, source: ExtractedEntity, concept: CodedConcept, context: BuildContext): PipelineRecord {
  const result = registry.build(recordType, source, concept, context);
  if (!result.success) throw result.error;
  return result.record;
}

const metformin: CodedConcept = { system: CODE_SYSTEMS.RXNORM, code: '6809', display: 'Metformin', text: 'metformin' };

const patient = built('Patient', entity('Patient', 'jane doe'), fallbackConcept('jane doe'), {
  localKey: 'patient-0',
  references: {},
  knownLocalKeys,
});

function order(references: BuildContext['references'] = { patient: localRef('patient-0') }): PipelineRecord {
  return built('MedicationRequest', entity('Medication', 'metformin'), metformin, {
    localKey: 'medication-0',
    references,
    knownLocalKeys,
    recordedAt: '2026-02-20T08:00:00Z',
  });
}

function assembled(records: PipelineRecord[]) {
  let n = 0;
  const result = new BundleAssembler({ generateId: () => `id-${++n}` }).assemble(records);
  if (!result.success) throw result.error;
  return result.bundle;
}

function withoutField(record: PipelineRecord, field: string): PipelineRecord {
  return { ...record, fields: Object.fromEntries(Object.entries(record.fields).filter(([key]) => key !== field)) };
}

function fakeRemote(result: RemoteValidationResult) {
  const validate = vi.fn(async (_bundle: FhirTransactionBundle) => result);
  const remote: RemoteValidator = { validate };
  return { remote, validate };
}

function outcome(issue: OperationOutcome['issue']): RemoteValidationResult {
  return { status: 'completed', outcome: { resourceType: 'OperationOutcome', issue } };
}

describe('ValidationOrchestrator', () => {
  describe('validate', () => {
    it('passes a well-formed bundle and skips the remote check when none is configured', async () => {
      const orchestrator = new ValidationOrchestrator({ registry });
      expect(orchestrator.remoteEnabled).toBe(false);
      expect(await orchestrator.validate(assembled([patient, order()]))).toEqual({
        valid: true,
        localStatus: 'valid',
        remoteStatus: 'skipped',
        issues: [],
        repairs: [],
        unresolvedEntries: [],
      });
    });

    it('reports a missing required field against its entry', async () => {
      const report = await new ValidationOrchestrator({ registry }).validate(
        assembled([patient, withoutField(order(), 'status')]),
      );
      expect(report.valid).toBe(false);
      expect(report.localStatus).toBe('invalid');
      expect(report.issues).toEqual([
        {
          severity: 'error',
          code: 'required',
          source: 'local',
          entryIndex: 1,
          path: 'MedicationRequest.status',
          message: 'MedicationRequest is missing required field "status"',
        },
      ]);
      expect(report.unresolvedEntries).toEqual([1]);
    });

    it('treats a fatal remote issue as an error on the named entry', async () => {
      const { remote } = fakeRemote(
        outcome([
          {
            severity: 'fatal',
            code: 'invalid',
            diagnostics: 'Unknown dosage form',
            expression: ['Bundle.entry[1].resource.dosageInstruction[0]'],
          },
        ]),
      );
      const report = await new ValidationOrchestrator({ registry, remote }).validate(assembled([patient, order()]));
      expect(report.remoteStatus).toBe('invalid');
      expect(report.valid).toBe(false);
      expect(report.issues).toEqual([
        {
          severity: 'error',
          code: 'remote',
          source: 'remote',
          entryIndex: 1,
          path: 'Bundle.entry[1].resource.dosageInstruction[0]',
          message: 'Unknown dosage form',
        },
      ]);
    });

    it('keeps the bundle valid when the remote side only warns', async () => {
      const { remote } = fakeRemote(
        outcome([{ severity: 'warning', code: 'informational', details: { text: 'No narrative' }, location: ['Bundle.entry[0]'] }]),
      );
      const report = await new ValidationOrchestrator({ registry, remote }).validate(assembled([patient, order()]));
      expect(report.remoteStatus).toBe('valid');
      expect(report.valid).toBe(true);
      expect(report.issues).toEqual([
        {
          severity: 'warning',
          code: 'remote',
          source: 'remote',
          entryIndex: 0,
          path: 'Bundle.entry[0]',
          message: 'No narrative',
        },
      ]);
    });

    it('reports unknown, not invalid, when the validator is unavailable', async () => {
      const { remote } = fakeRemote({ status: 'unavailable', reason: 'FHIR validator timed out after 5000ms' });
      expect(await new ValidationOrchestrator({ registry, remote }).validate(assembled([patient, order()]))).toEqual({
        valid: true,
        localStatus: 'valid',
        remoteStatus: 'unknown',
        remoteReason: 'FHIR validator timed out after 5000ms',
        issues: [],
        repairs: [],
        unresolvedEntries: [],
      });
    });

    it('sends the rendered transaction bundle to the remote validator', async () => {
      const { remote, validate } = fakeRemote(outcome([]));
      await new ValidationOrchestrator({ registry, remote }).validate(assembled([patient, order()]));
      expect(validate).toHaveBeenCalledTimes(1);
      expect(validate).toHaveBeenCalledWith(
        expect.objectContaining({
          resourceType: 'Bundle',
          type: 'transaction',
          entry: [
            expect.objectContaining({ fullUrl: 'urn:uuid:id-1' }),
            expect.objectContaining({ fullUrl: 'urn:uuid:id-2' }),
          ],
        }),
      );
    });
  });

  describe('validateAndRepair', () => {
    it('returns the bundle untouched when nothing fails', async () => {
      const bundle = assembled([patient, order()]);
      const result = await new ValidationOrchestrator({ registry }).validateAndRepair(bundle);
      expect(result.bundle).toBe(bundle);
      expect(result.report.repairs).toEqual([]);
    });

    it('replaces an entry missing a required field with its reduced form', async () => {
      const bundle = assembled([patient, withoutField(order(), 'status')]);
      const { bundle: repaired, report } = await new ValidationOrchestrator({ registry }).validateAndRepair(bundle);

      const entry = repaired.entries[1];
      expect(entry?.internalId).toBe('id-2');
      expect(entry?.record.fields.status).toBe('active');
      expect(entry?.record.fields.meta).toEqual(reducedMeta());
      expect(entry?.record.fields.authoredOn).toBeUndefined();
      expect(entry?.record.references).toEqual({ subject: { kind: 'bundle', internalId: 'id-1' } });
      expect(repaired.entries[0]).toBe(bundle.entries[0]);

      expect(report).toEqual({
        valid: true,
        localStatus: 'valid',
        remoteStatus: 'skipped',
        issues: [],
        repairs: [
          {
            entryIndex: 1,
            internalId: 'id-2',
            recordType: 'MedicationRequest',
            trigger: 'local',
            unresolved: false,
            droppedReferences: [],
          },
        ],
        unresolvedEntries: [],
      });
    });

    it('marks an entry unresolved when the reduced form still fails', async () => {
      const { bundle, report } = await new ValidationOrchestrator({ registry }).validateAndRepair(
        assembled([patient, order({})]),
      );
      expect(bundle.entries).toHaveLength(2);
      expect(report.valid).toBe(false);
      expect(report.unresolvedEntries).toEqual([1]);
      expect(report.repairs.map((r) => r.unresolved)).toEqual([true]);
      expect(report.issues.map((i) => i.path)).toEqual(['MedicationRequest.subject']);
    });

    it('repairs entries named by a remote error without asking again', async () => {
      const { remote, validate } = fakeRemote(
        outcome([{ severity: 'error', code: 'invalid', diagnostics: 'Bad dose', expression: ['Bundle.entry[1]'] }]),
      );
      const { bundle, report } = await new ValidationOrchestrator({ registry, remote }).validateAndRepair(
        assembled([patient, order()]),
      );
      expect(validate).toHaveBeenCalledTimes(1);
      expect(bundle.entries[1]?.record.origin?.reduced).toBe(true);
      expect(report.repairs).toEqual([
        {
          entryIndex: 1,
          internalId: 'id-2',
          recordType: 'MedicationRequest',
          trigger: 'remote',
          unresolved: false,
          droppedReferences: [],
        },
      ]);
      expect(report.remoteStatus).toBe('invalid');
      expect(report.valid).toBe(true);
      expect(report.issues.map((i) => i.message)).toEqual(['Bad dose']);
    });

    it('reports a remote error past the last entry against the bundle', async () => {
      const { remote } = fakeRemote(
        outcome([{ severity: 'error', code: 'invalid', diagnostics: 'No such entry', expression: ['Bundle.entry[7]'] }]),
      );
      const input = assembled([patient, order()]);
      const { bundle, report } = await new ValidationOrchestrator({ registry, remote }).validateAndRepair(input);
      expect(bundle).toBe(input);
      expect(report.repairs).toEqual([]);
      expect(report.unresolvedEntries).toEqual([]);
      expect(report.remoteStatus).toBe('invalid');
      expect(report.valid).toBe(false);
      expect(report.issues).toEqual([
        {
          severity: 'error',
          code: 'remote',
          source: 'remote',
          path: 'Bundle.entry[7]',
          message: 'No such entry',
        },
      ]);
    });

    it('cannot rebuild a record that carries no origin', async () => {
      const provenance: PipelineRecord = {
        recordType: 'Provenance',
        localKey: 'provenance-0',
        fields: { recorded: '2026-02-20T08:00:00Z' },
        references: { 'target.0': localRef('patient-0') },
      };
      const { report } = await new ValidationOrchestrator({ registry }).validateAndRepair(
        assembled([patient, provenance]),
      );
      expect(report.repairs).toEqual([
        {
          entryIndex: 1,
          internalId: 'id-2',
          recordType: 'Provenance',
          trigger: 'local',
          unresolved: true,
          droppedReferences: [],
        },
      ]);
    });
  });
});
