import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { config } from '../config.js';

const TermList = z.array(z.string().trim().toLowerCase().min(1)).min(1);

export const LexiconSchema = z.object({
  medications: TermList,
  labTests: TermList,
  procedures: TermList,
  routes: TermList,
  devices: TermList,
  deviceHeads: TermList,
  deviceModifiers: TermList,
  vitals: TermList,
  honorifics: TermList,
  orderCues: TermList,
  administrationCues: TermList,
  patientStopWords: TermList,
  nonDrugWords: TermList,
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export function parseLexicon(raw: unknown): Lexicon {
  return Object.freeze(LexiconSchema.parse(raw));
}

export function loadLexicon(path: string = config.extraction.lexiconPath): Lexicon {
  return parseLexicon(JSON.parse(readFileSync(path, 'utf8')));
}
