import { describe, it, expect } from 'vitest';
import { CODE_SYSTEMS } from '@notefhir/shared';
import { parseDoseQuantity, parseVitalReading } from './quantities.js';

describe('parseDoseQuantity', () => {
  it('reads body-surface dosing', () => {
    expect(parseDoseQuantity('80mg/m²')).toEqual({
      value: 80,
      unit: 'mg/m²',
      system: CODE_SYSTEMS.UCUM,
      code: 'mg/m2',
    });
  });

  it('maps unit words to UCUM codes', () => {
    expect(parseDoseQuantity('10 Units')).toEqual({
      value: 10,
      unit: 'units',
      system: CODE_SYSTEMS.UCUM,
      code: '[U]',
    });
    expect(parseDoseQuantity('0.5 mcg')?.code).toBe('ug');
  });

  it('gives nothing for AUC targets and unknown units', () => {
    expect(parseDoseQuantity('AUC 6')).toBeUndefined();
    expect(parseDoseQuantity('2 tabs')).toBeUndefined();
  });
});

describe('parseVitalReading', () => {
  it('splits a blood pressure into systolic and diastolic', () => {
    expect(parseVitalReading(' 120/80 mmhg', '55284-4')).toEqual({
      kind: 'pair',
      systolic: { value: 120, unit: 'mm[Hg]', system: CODE_SYSTEMS.UCUM, code: 'mm[Hg]' },
      diastolic: { value: 80, unit: 'mm[Hg]', system: CODE_SYSTEMS.UCUM, code: 'mm[Hg]' },
    });
  });

  it('reads a single value with its unit', () => {
    expect(parseVitalReading(': 38.5 c', '8310-5')).toEqual({
      kind: 'single',
      value: { value: 38.5, unit: 'Cel', system: CODE_SYSTEMS.UCUM, code: 'Cel' },
    });
  });

  it('assumes the usual unit when none is written', () => {
    expect(parseVitalReading(' 110', '8867-4')).toEqual({
      kind: 'single',
      value: { value: 110, unit: '/min', system: CODE_SYSTEMS.UCUM, code: '/min' },
    });
  });

  it('keeps a bare number when no unit is known', () => {
    expect(parseVitalReading(' 7', '')).toEqual({ kind: 'single', value: { value: 7 } });
  });

  it('gives nothing without a number', () => {
    expect(parseVitalReading(' high', '8867-4')).toBeUndefined();
  });
});
