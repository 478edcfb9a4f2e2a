import type fhir4 from 'fhir/r4';
import { CODE_SYSTEMS } from '@notefhir/shared';

const DOSE_UNITS: Record<string, string> = {
  mg: 'mg',
  g: 'g',
  mcg: 'ug',
  'μg': 'ug',
  'µg': 'ug',
  ml: 'mL',
  unit: '[U]',
  units: '[U]',
  iu: '[iU]',
  meq: 'meq',
  'mg/kg': 'mg/kg',
  'mcg/kg': 'ug/kg',
  'mg/kg/day': 'mg/kg/d',
  'mg/m2': 'mg/m2',
  'mg/m²': 'mg/m2',
};

const VITAL_UNITS: Record<string, string> = {
  '%': '%',
  mmhg: 'mm[Hg]',
  bpm: '/min',
  '/min': '/min',
  'breaths/min': '/min',
  kg: 'kg',
  lb: '[lb_av]',
  lbs: '[lb_av]',
  cm: 'cm',
  c: 'Cel',
  '°c': 'Cel',
  f: '[degF]',
  '°f': '[degF]',
};

// Unit assumed when a reading is written without one, by LOINC code
const DEFAULT_VITAL_UNITS: Record<string, string> = {
  '8867-4': '/min',
  '9279-1': '/min',
  '59408-5': '%',
  '8480-6': 'mm[Hg]',
  '8462-4': 'mm[Hg]',
  '55284-4': 'mm[Hg]',
};

function quantity(value: number, unit: string | undefined, ucum: string | undefined): fhir4.Quantity {
  if (!ucum) return { value };
  return { value, unit: unit ?? ucum, system: CODE_SYSTEMS.UCUM, code: ucum };
}

/** `80mg/m²` → 80 mg/m2. AUC targets and unknown units give undefined. */
export function parseDoseQuantity(text: string): fhir4.Quantity | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*(\S+)$/.exec(text.trim().toLowerCase());
  if (!match) return undefined;
  const [, value, unit] = match;
  const ucum = unit !== undefined ? DOSE_UNITS[unit] : undefined;
  if (value === undefined || ucum === undefined) return undefined;
  return quantity(Number(value), unit, ucum);
}

export type VitalReading =
  | { kind: 'single'; value: fhir4.Quantity }
  | { kind: 'pair'; systolic: fhir4.Quantity; diastolic: fhir4.Quantity };

/**
 * Read the value part of a vital-sign mention, e.g. `120/80 mmHg` or `: 92%`.
 * `loincCode` picks a unit when the text carries none.
 */
export function parseVitalReading(valueText: string, loincCode: string): VitalReading | undefined {
  const match = /(\d+(?:\.\d+)?)(?:\s*\/\s*(\d+(?:\.\d+)?))?\s*(\S+)?/.exec(valueText.toLowerCase());
  if (!match) return undefined;
  const [, first, second, unitText] = match;
  if (first === undefined) return undefined;

  const ucum = (unitText !== undefined ? VITAL_UNITS[unitText] : undefined) ?? DEFAULT_VITAL_UNITS[loincCode];

  if (second !== undefined) {
    return {
      kind: 'pair',
      systolic: quantity(Number(first), undefined, ucum ?? 'mm[Hg]'),
      diastolic: quantity(Number(second), undefined, ucum ?? 'mm[Hg]'),
    };
  }
  return { kind: 'single', value: quantity(Number(first), undefined, ucum) };
}
