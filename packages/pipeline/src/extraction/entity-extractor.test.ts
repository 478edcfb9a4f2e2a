import { describe, it, expect } from 'vitest';
import { EntityExtractor } from './entity-extractor.js';
import { loadLexicon } from './lexicon.js';

const extractor = new EntityExtractor(loadLexicon());

function summary(text: string) {
  return extractor.extract(text).map((e) => [e.kind, e.rawText, e.sourceOffset.start, e.sourceOffset.end]);
}

describe('EntityExtractor', () => {
  it('finds patient, medication, dosage and route in an order note', () => {
    expect(summary('Patient: jane doe needs cisplatin 80mg/m² IV daily')).toEqual([
      ['Patient', 'jane doe', 9, 17],
      ['Medication', 'cisplatin', 24, 33],
      ['Dosage', '80mg/m²', 34, 41],
      ['Route', 'IV', 42, 44],
    ]);
  });

  it('returns one medication per distinct mention', () => {
    const meds = extractor
      .extract('cisplatin 80mg/m² IV on day 1, followed by carboplatin AUC 6')
      .filter((e) => e.kind === 'Medication')
      .map((e) => e.normalizedText);
    expect(meds).toEqual(['cisplatin', 'carboplatin']);
  });

  it('treats AUC targets as dosages', () => {
    const dosages = extractor
      .extract('carboplatin AUC 6')
      .filter((e) => e.kind === 'Dosage')
      .map((e) => e.rawText);
    expect(dosages).toEqual(['AUC 6']);
  });

  it('keeps only the widest of overlapping spans of one kind', () => {
    const devices = extractor.extract('Start IV pump now').filter((e) => e.kind === 'Device');
    expect(devices).toHaveLength(1);
    expect(devices[0]).toMatchObject({ rawText: 'IV pump', rule: 'device-lexicon' });
  });

  it('catches a medication outside the vocabulary after an order cue', () => {
    expect(extractor.extract('give the patient zz-compound-9 now')).toEqual([
      {
        kind: 'Medication',
        rawText: 'zz-compound-9',
        normalizedText: 'zz-compound-9',
        sourceOffset: { start: 17, end: 30 },
        confidence: 0.6,
        rule: 'medication-cue',
      },
    ]);
  });

  it('prefers the vocabulary rule when the cue rule finds the same drug', () => {
    const [med] = extractor.extract('start metformin').filter((e) => e.kind === 'Medication');
    expect(med?.rule).toBe('medication-lexicon');
  });

  it('does not read the first word of a lab, procedure or device term as a drug', () => {
    for (const text of [
      'order complete blood count',
      'order blood cultures x2',
      'order chest x-ray',
      'order bone marrow biopsy',
      'start foley catheter',
    ]) {
      expect(extractor.extract(text).filter((e) => e.kind === 'Medication')).toEqual([]);
    }
  });

  it('counts exactly the medications named next to ordered labs and procedures', () => {
    const text =
      'Start cisplatin and order lipid panel. Give metformin 500 mg PO; ' +
      'order CBC and CMP, complete blood count and bone marrow biopsy';
    const meds = extractor
      .extract(text)
      .filter((e) => e.kind === 'Medication')
      .map((e) => e.normalizedText);
    expect(meds).toEqual(['cisplatin', 'metformin']);
  });

  it('ignores pronouns and numbers after an order cue', () => {
    expect(extractor.extract('give him 500mg').filter((e) => e.kind === 'Medication')).toEqual([]);
  });

  it('matches through typographic quotes and keeps the original casing', () => {
    const [patient] = extractor
      .extract('Pt: Mr. John O’Brien was given morphine 4 mg IV')
      .filter((e) => e.kind === 'Patient');
    expect(patient).toEqual({
      kind: 'Patient',
      rawText: 'John O’Brien',
      normalizedText: "john o'brien",
      sourceOffset: { start: 8, end: 20 },
      confidence: 0.95,
      rule: 'patient-labelled',
    });
  });

  it('falls back to an honorific when there is no label', () => {
    const [patient] = extractor
      .extract('Mrs. Smith received heparin')
      .filter((e) => e.kind === 'Patient');
    expect(patient).toMatchObject({ rawText: 'Smith', rule: 'patient-honorific' });
  });

  it('keeps a name that is also a lab or procedure term', () => {
    expect(summary('Patient: Ana Lopez needs aspirin')).toEqual([
      ['Patient', 'Ana Lopez', 9, 18],
      ['Medication', 'aspirin', 25, 32],
    ]);
    expect(summary('Patient: Iron Smith')).toEqual([['Patient', 'Iron Smith', 9, 19]]);
  });

  it('only treats a title as an honorific before a capitalised name', () => {
    expect(extractor.extract('Patient may miss doses today')).toEqual([]);
    expect(summary('Miss Taylor needs aspirin')).toEqual([
      ['Patient', 'Taylor', 5, 11],
      ['Medication', 'aspirin', 18, 25],
    ]);
  });

  it('reads vital-sign readings and looks them up by vital name', () => {
    const observations = extractor
      .extract('BP 120/80 mmHg, HR 110 bpm')
      .filter((e) => e.kind === 'Observation')
      .map((e) => [e.rawText, e.normalizedText]);
    expect(observations).toEqual([
      ['BP 120/80 mmHg', 'bp'],
      ['HR 110 bpm', 'hr'],
    ]);
  });

  it('finds lab tests and procedures', () => {
    const found = extractor
      .extract('Order CBC and troponin; obtain chest x-ray')
      .map((e) => [e.kind, e.normalizedText]);
    expect(found).toEqual([
      ['LabTest', 'cbc'],
      ['LabTest', 'troponin'],
      ['Procedure', 'chest x-ray'],
    ]);
  });

  it('is deterministic', () => {
    const text = 'Patient: Ann Lee on vancomycin 1 g IV q12h via PICC line. CMP and CRP.';
    expect(extractor.extract(text)).toEqual(extractor.extract(text));
  });

  it('returns nothing for text without clinical content', () => {
    expect(extractor.extract('')).toEqual([]);
    expect(extractor.extract('see you tomorrow')).toEqual([]);
  });
});
