import { fallbackConcept } from '@notefhir/shared';
import type { CodedConcept, EntityKind } from '@notefhir/shared';
import { normalizeTerm, type TableName, type TerminologyTable, type TerminologyTables } from './terminology-tables.js';

const KIND_TABLES: Readonly<Record<EntityKind, readonly TableName[]>> = {
  Patient: [],
  Dosage: [],
  Medication: ['medications'],
  LabTest: ['labs'],
  Observation: ['vitals', 'labs'],
  Procedure: ['procedures'],
  Route: ['routes'],
  Device: ['devices'],
};

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[a-z0-9]/.test(ch);
}

function containsTerm(text: string, term: string): boolean {
  let from = 0;
  for (;;) {
    const at = text.indexOf(term, from);
    if (at < 0) return false;
    if (!isWordChar(text[at - 1]) && !isWordChar(text[at + term.length])) return true;
    from = at + 1;
  }
}

/**
 * Maps a normalized surface string to a coded concept. Total: anything the
 * tables do not know becomes a text-only fallback concept.
 */
export class TerminologyMapper {
  constructor(private readonly tables: TerminologyTables) {}

  mapConcept(kind: EntityKind, normalizedText: string): CodedConcept {
    const text = normalizeTerm(normalizedText);
    const tables = KIND_TABLES[kind].map((name) => this.tables[name]);

    for (const table of tables) {
      const entry = table.entries.get(text);
      if (entry) return this.concept(table, entry.code, entry.display, normalizedText);
    }

    let best: { table: TerminologyTable; term: string } | undefined;
    for (const table of tables) {
      const term = table.termsByLength.find((t) => containsTerm(text, t));
      if (term && (!best || term.length > best.term.length)) {
        best = { table, term };
      }
    }
    if (best) {
      const entry = best.table.entries.get(best.term);
      if (entry) return this.concept(best.table, entry.code, entry.display, normalizedText);
    }

    return fallbackConcept(normalizedText);
  }

  private concept(table: TerminologyTable, code: string, display: string, text: string): CodedConcept {
    return { system: table.system, code, display, text };
  }
}
