import type { EntityKind, SourceOffset } from '@notefhir/shared';
import type { Lexicon } from './lexicon.js';
import { termAlternation } from './normalize.js';

export interface PatternRule {
  readonly id: string;
  readonly kind: EntityKind;
  /** Compiled with the `g` and `d` flags, matched against normalized text. */
  readonly pattern: RegExp;
  /** Breaks ties between overlapping spans of equal width; higher wins. */
  readonly specificity: number;
  readonly confidence: number;
  /** Capture group holding the entity span; 0 is the whole match. */
  readonly spanGroup?: number;
  /** Capture group whose text is looked up in the terminology tables. */
  readonly normalizeGroup?: number;
  /** Narrows or rejects a span; offsets are shared by the original and normalized text. */
  readonly refine?: (span: SourceOffset, normalized: string, text: string) => SourceOffset | undefined;
}

const B = '(?<![a-z0-9])';
const E = '(?![a-z0-9])';
const NAME_TOKEN = "[a-z][a-z'-]*";
const NAME = `${NAME_TOKEN}(?:[ \\t]+${NAME_TOKEN}){0,2}`;
const TOKEN_RE = /[^\s]+/g;

const DOSE_UNITS = [
  'mg/m²',
  'mg/m2',
  'mg/kg/day',
  'mg/kg',
  'mcg/kg',
  'mg',
  'mcg',
  'μg',
  'µg',
  'g',
  'ml',
  'units',
  'unit',
  'iu',
  'meq',
];

const VITAL_UNITS = ['breaths/min', '/min', 'mmhg', 'bpm', 'kg', 'lbs', 'lb', 'cm', '°c', '°f', '%', 'c', 'f'];

function compile(source: string): RegExp {
  return new RegExp(source, 'gd');
}

function wordsOf(terms: readonly string[]): Set<string> {
  return new Set(terms.flatMap((term) => term.split(/\s+/)));
}

/**
 * Cut a candidate name at the first word that cannot be part of it: a stop
 * word, a gerund, a drug or cue word, or (after the first word) other
 * clinical vocabulary. Names such as Ana or Iron collide with lab terms.
 */
function nameCutter(lexicon: Lexicon) {
  const stopWords = new Set(lexicon.patientStopWords);
  const drugAndCueWords = wordsOf([...lexicon.medications, ...lexicon.orderCues, ...lexicon.administrationCues]);
  const clinicalWords = wordsOf([...lexicon.labTests, ...lexicon.procedures, ...lexicon.routes, ...lexicon.vitals]);

  return (span: SourceOffset, normalized: string): SourceOffset | undefined => {
    const slice = normalized.slice(span.start, span.end);
    let end = span.start;
    let position = 0;
    for (const token of slice.matchAll(TOKEN_RE)) {
      const word = token[0].replace(/[^a-z'-]+$/, '');
      if (
        word === '' ||
        stopWords.has(word) ||
        drugAndCueWords.has(word) ||
        word.endsWith('ing') ||
        (position > 0 && clinicalWords.has(word))
      ) {
        break;
      }
      end = span.start + (token.index ?? 0) + word.length;
      position++;
    }
    return end > span.start ? { start: span.start, end } : undefined;
  };
}

/** Rejects pronouns, numbers, and the first word of any non-drug vocabulary term after an order cue. */
function orderCueCandidate(lexicon: Lexicon) {
  const nonDrugWords = new Set(lexicon.nonDrugWords);
  const otherTerm = new RegExp(
    `(?:${termAlternation([
      ...lexicon.labTests,
      ...lexicon.procedures,
      ...lexicon.routes,
      ...lexicon.vitals,
      ...lexicon.devices,
    ])}|(?:(?:${termAlternation(lexicon.deviceModifiers)})[ \\t]+)?(?:${termAlternation(lexicon.deviceHeads)})s?)${E}`,
    'y',
  );

  return (span: SourceOffset, normalized: string): SourceOffset | undefined => {
    const word = normalized.slice(span.start, span.end).replace(/['-]+$/, '');
    if (word === '' || nonDrugWords.has(word) || /^\d/.test(word)) {
      return undefined;
    }
    otherTerm.lastIndex = span.start;
    if (otherTerm.test(normalized)) {
      return undefined;
    }
    return { start: span.start, end: span.start + word.length };
  };
}

function startsCapitalized(text: string, offset: number): boolean {
  const ch = text.charAt(offset);
  return ch !== ch.toLowerCase();
}

/**
 * Ordered pattern rules. Within a kind, specific multi-token rules come before
 * their generic fallbacks.
 */
export function buildRules(lexicon: Lexicon): PatternRule[] {
  const honorifics = termAlternation(lexicon.honorifics);
  const cutName = nameCutter(lexicon);

  return [
    {
      id: 'patient-labelled',
      kind: 'Patient',
      pattern: compile(
        `${B}(?:patient|pt)(?:[ \\t]+name)?[ \\t]*:[ \\t]*(?:(?:${honorifics})\\.?[ \\t]+)?(${NAME})`,
      ),
      specificity: 3,
      confidence: 0.95,
      spanGroup: 1,
      refine: cutName,
    },
    {
      id: 'patient-named',
      kind: 'Patient',
      pattern: compile(`${B}(?:patient|pt)[ \\t]+(?:named|called)[ \\t]+(${NAME})`),
      specificity: 2,
      confidence: 0.9,
      spanGroup: 1,
      refine: cutName,
    },
    {
      id: 'patient-honorific',
      kind: 'Patient',
      pattern: compile(`${B}(?:${honorifics})\\.?[ \\t]+(${NAME})`),
      specificity: 1,
      confidence: 0.75,
      spanGroup: 1,
      // "miss" and "ms" are also ordinary words; only a capitalised name follows a title
      refine: (span, normalized, text) =>
        startsCapitalized(text, span.start) ? cutName(span, normalized) : undefined,
    },
    {
      id: 'medication-lexicon',
      kind: 'Medication',
      pattern: compile(`${B}(?:${termAlternation(lexicon.medications)})${E}`),
      specificity: 2,
      confidence: 0.9,
    },
    {
      id: 'medication-cue',
      kind: 'Medication',
      pattern: compile(
        `${B}(?:${termAlternation(lexicon.orderCues)})(?:[ \\t]+(?:the|this))?(?:[ \\t]+(?:patient|pt))?(?:[ \\t]+on)?[ \\t]+([a-z0-9][a-z0-9'-]*)`,
      ),
      specificity: 1,
      confidence: 0.6,
      spanGroup: 1,
      refine: orderCueCandidate(lexicon),
    },
    {
      id: 'dosage-unit',
      kind: 'Dosage',
      pattern: compile(
        `(?<![a-z0-9.])\\d+(?:\\.\\d+)?[ \\t]*(?:${DOSE_UNITS.map((u) => u.replace(/\//g, '\\/')).join('|')})${E}`,
      ),
      specificity: 2,
      confidence: 0.9,
    },
    {
      id: 'dosage-auc',
      kind: 'Dosage',
      pattern: compile(`${B}auc[ \\t]*(?:=|of)?[ \\t]*\\d+(?:\\.\\d+)?${E}`),
      specificity: 2,
      confidence: 0.85,
    },
    {
      id: 'route-lexicon',
      kind: 'Route',
      pattern: compile(`${B}(?:${termAlternation(lexicon.routes)})${E}`),
      specificity: 1,
      confidence: 0.85,
    },
    {
      id: 'device-lexicon',
      kind: 'Device',
      pattern: compile(`${B}(?:${termAlternation(lexicon.devices)})${E}`),
      specificity: 2,
      confidence: 0.85,
    },
    {
      id: 'device-generic',
      kind: 'Device',
      pattern: compile(
        `${B}(?:(?:${termAlternation(lexicon.deviceModifiers)})[ \\t]+)?(?:${termAlternation(lexicon.deviceHeads)})s?${E}`,
      ),
      specificity: 1,
      confidence: 0.6,
    },
    {
      id: 'lab-lexicon',
      kind: 'LabTest',
      pattern: compile(`${B}(?:${termAlternation(lexicon.labTests)})${E}`),
      specificity: 2,
      confidence: 0.85,
    },
    {
      id: 'vital-reading',
      kind: 'Observation',
      pattern: compile(
        `${B}(${termAlternation(lexicon.vitals)})(?:[ \\t]*(?:of|is|was|=|:))?[ \\t]*\\d+(?:\\.\\d+)?(?:[ \\t]*\\/[ \\t]*\\d+)?(?:[ \\t]*(?:${VITAL_UNITS.map((u) => u.replace(/\//g, '\\/')).join('|')}))?(?![a-z0-9])`,
      ),
      specificity: 2,
      confidence: 0.9,
      normalizeGroup: 1,
    },
    {
      id: 'procedure-lexicon',
      kind: 'Procedure',
      pattern: compile(`${B}(?:${termAlternation(lexicon.procedures)})${E}`),
      specificity: 2,
      confidence: 0.8,
    },
  ];
}
