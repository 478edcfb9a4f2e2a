import { describe, it, expect } from 'vitest';
import { EntityExtractor } from '../extraction/entity-extractor.js';
import { loadLexicon } from '../extraction/lexicon.js';
import { TerminologyMapper } from '../terminology/terminology-mapper.js';
import { loadTerminologyTables } from '../terminology/terminology-tables.js';
import { RecordPlanner, type PlanInput } from './record-planner.js';

const lexicon = loadLexicon();
const extractor = new EntityExtractor(lexicon);
const planner = new RecordPlanner(new TerminologyMapper(loadTerminologyTables()), lexicon);

function plan(text: string, extra: Partial<PlanInput> = {}) {
  return planner.plan({
    text,
    entities: extractor.extract(text),
    recordedAt: '2026-02-20T08:00:00Z',
    ...extra,
  });
}

function shape(text: string, extra: Partial<PlanInput> = {}) {
  return plan(text, extra).records.map((r) => [r.recordType, r.context.localKey]);
}

describe('RecordPlanner', () => {
  it('plans a patient and an order pointing at it', () => {
    const { records } = plan('Patient: jane doe needs cisplatin 80mg/m² IV daily');
    expect(records.map((r) => [r.recordType, r.context.localKey])).toEqual([
      ['Patient', 'patient-0'],
      ['MedicationRequest', 'medication-0'],
    ]);

    const order = records[1];
    expect(order?.concept.code).toBe('2555');
    expect(order?.context.references.patient).toEqual({ kind: 'local', localKey: 'patient-0' });
    expect(order?.context.knownLocalKeys).toEqual(new Set(['patient-0', 'medication-0']));
    expect(order?.context.modifiers?.dosage?.rawText).toBe('80mg/m²');
    expect(order?.context.modifiers?.route?.rawText).toBe('IV');
    expect(order?.context.modifiers?.routeConcept?.code).toBe('47625008');
    expect(order?.context.modifiers?.frequency).toEqual({
      text: 'daily',
      repeat: { frequency: 1, period: 1, periodUnit: 'd' },
      asNeeded: false,
    });
  });

  it('adds an administration when the sentence says the drug was given', () => {
    const { records } = plan('Mrs. Smith was given morphine 4 mg IV via PCA pump.');
    expect(records.map((r) => [r.recordType, r.context.localKey])).toEqual([
      ['Patient', 'patient-0'],
      ['MedicationRequest', 'medication-0'],
      ['MedicationAdministration', 'administration-0'],
      ['Device', 'device-0'],
    ]);
    expect(records[2]?.context.references).toEqual({
      patient: { kind: 'local', localKey: 'patient-0' },
      practitioner: undefined,
      request: { kind: 'local', localKey: 'medication-0' },
      device: { kind: 'local', localKey: 'device-0' },
    });
  });

  it('uses the caller patient reference when the text names nobody', () => {
    const { records } = plan('Start metformin 500 mg', {
      patientReference: 'Patient/123',
      practitionerReference: 'Practitioner/7',
    });
    expect(records).toHaveLength(1);
    expect(records[0]?.context.references).toEqual({
      patient: { kind: 'concrete', reference: 'Patient/123' },
      practitioner: { kind: 'concrete', reference: 'Practitioner/7' },
    });
  });

  it('plans a reduced anonymous patient when there is no patient at all', () => {
    const { records } = plan('Start metformin 500 mg');
    expect(records[0]).toMatchObject({ recordType: 'Patient', reduced: true, context: { localKey: 'patient-0' } });
    expect(records[1]?.context.references.patient).toEqual({ kind: 'local', localKey: 'patient-0' });
  });

  it('links each modifier to the nearest medication of its sentence', () => {
    const { records } = plan('metformin 500 mg and lisinopril 10 mg daily', { patientReference: 'Patient/1' });
    const [metformin, lisinopril] = records;
    expect(metformin?.context.modifiers?.dosage?.rawText).toBe('500 mg');
    expect(metformin?.context.modifiers?.frequency).toBeUndefined();
    expect(lisinopril?.context.modifiers?.dosage?.rawText).toBe('10 mg');
    expect(lisinopril?.context.modifiers?.frequency?.text).toBe('daily');
  });

  it('never turns a modifier into a record of its own', () => {
    const result = plan('Metformin 500 mg. IV fluids.', { patientReference: 'Patient/1' });
    expect(result.records.map((r) => r.recordType)).toEqual(['MedicationRequest']);
    expect(result.unlinkedModifiers.map((e) => e.rawText)).toEqual(['IV']);
  });

  it('plans lab, procedure and vital-sign records with their categories', () => {
    const { records } = plan('Order CBC and chest x-ray. HR 110', { patientReference: 'Patient/1' });
    expect(records.map((r) => [r.recordType, r.context.localKey, r.context.category])).toEqual([
      ['ServiceRequest', 'lab-0', 'laboratory'],
      ['ServiceRequest', 'procedure-0', 'procedure'],
      ['Observation', 'observation-0', 'vital-signs'],
    ]);
  });

  it('plans nothing for text without entities', () => {
    expect(shape('see you tomorrow')).toEqual([]);
  });
});
