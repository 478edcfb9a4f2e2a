import { describe, it, expect } from 'vitest';
import { CODE_SYSTEMS, PLACEHOLDER_CODE_PATTERN } from '@notefhir/shared';
import { TerminologyMapper } from './terminology-mapper.js';
import { loadTerminologyTables } from './terminology-tables.js';

const mapper = new TerminologyMapper(loadTerminologyTables());

describe('TerminologyMapper', () => {
  it('maps an exact medication term to RxNorm', () => {
    expect(mapper.mapConcept('Medication', 'cisplatin')).toEqual({
      system: CODE_SYSTEMS.RXNORM,
      code: '2555',
      display: 'Cisplatin',
      text: 'cisplatin',
    });
  });

  it('maps brand names to their ingredient code', () => {
    expect(mapper.mapConcept('Medication', 'tylenol').code).toBe('161');
  });

  it('finds the longest known term contained on word boundaries', () => {
    expect(mapper.mapConcept('Device', 'new iv pump')).toMatchObject({
      system: CODE_SYSTEMS.SNOMED,
      code: '182722004',
      text: 'new iv pump',
    });
  });

  it('does not match a term inside another word', () => {
    expect(mapper.mapConcept('Procedure', 'octreotide').code).toBe('');
  });

  it('looks vitals up before labs for observations', () => {
    expect(mapper.mapConcept('Observation', 'hr')).toMatchObject({
      system: CODE_SYSTEMS.LOINC,
      code: '8867-4',
      display: 'Heart rate',
    });
  });

  it('maps routes and lab tests to their tables', () => {
    expect(mapper.mapConcept('Route', 'iv').code).toBe('47625008');
    expect(mapper.mapConcept('LabTest', 'cbc').code).toBe('58410-2');
  });

  it('returns a text-only fallback for unknown terms', () => {
    expect(mapper.mapConcept('Medication', 'zz-compound-9')).toEqual({
      system: '',
      code: '',
      display: '',
      text: 'zz-compound-9',
    });
  });

  it('never maps patient names or dosages', () => {
    expect(mapper.mapConcept('Patient', 'insulin').code).toBe('');
    expect(mapper.mapConcept('Dosage', '10 mg').code).toBe('');
  });

  it('never returns a placeholder code', () => {
    for (const term of ['cisplatin', 'unknown', 'zz-compound-9', 'mri']) {
      const concept = mapper.mapConcept('Medication', term);
      expect(PLACEHOLDER_CODE_PATTERN.test(concept.code)).toBe(false);
    }
  });
});
