import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { PLACEHOLDER_CODE_PATTERN } from '@notefhir/shared';
import { config } from '../config.js';

export const TABLE_NAMES = ['medications', 'labs', 'vitals', 'procedures', 'routes', 'devices'] as const;
export type TableName = (typeof TABLE_NAMES)[number];

const TERMINOLOGY_FILES = ['rxnorm.json', 'loinc.json', 'snomed.json'];

const ConceptEntrySchema = z.object({
  code: z
    .string()
    .trim()
    .min(1)
    .refine((code) => !PLACEHOLDER_CODE_PATTERN.test(code), {
      message: 'Placeholder codes are not allowed in terminology tables',
    }),
  display: z.string().trim().min(1),
});

export const TerminologyFileSchema = z.object({
  system: z.string().url(),
  tables: z.record(z.record(ConceptEntrySchema)),
});

export type TerminologyFile = z.infer<typeof TerminologyFileSchema>;

export interface TableEntry {
  readonly code: string;
  readonly display: string;
}

export interface TerminologyTable {
  readonly name: TableName;
  readonly system: string;
  readonly entries: ReadonlyMap<string, TableEntry>;
  /** Terms ordered longest first, for containment lookups. */
  readonly termsByLength: readonly string[];
}

export type TerminologyTables = Readonly<Record<TableName, TerminologyTable>>;

export function normalizeTerm(term: string): string {
  return term.toLowerCase().replace(/\s+/g, ' ').trim();
}

function isTableName(name: string): name is TableName {
  return TABLE_NAMES.some((t) => t === name);
}

/**
 * Merge parsed terminology files into frozen lookup tables. Every table name
 * must be provided exactly once.
 */
export function buildTerminologyTables(files: readonly TerminologyFile[]): TerminologyTables {
  const built = new Map<TableName, TerminologyTable>();

  for (const file of files) {
    for (const [name, concepts] of Object.entries(file.tables)) {
      if (!isTableName(name)) {
        throw new Error(`Unknown terminology table "${name}"`);
      }
      if (built.has(name)) {
        throw new Error(`Terminology table "${name}" is defined more than once`);
      }
      const entries = new Map<string, TableEntry>();
      for (const [term, entry] of Object.entries(concepts)) {
        entries.set(normalizeTerm(term), Object.freeze({ code: entry.code, display: entry.display }));
      }
      built.set(
        name,
        Object.freeze({
          name,
          system: file.system,
          entries,
          termsByLength: Object.freeze(
            [...entries.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b)),
          ),
        }),
      );
    }
  }

  const missing = TABLE_NAMES.filter((name) => !built.has(name));
  if (missing.length > 0) {
    throw new Error(`Missing terminology tables: ${missing.join(', ')}`);
  }

  const table = (name: TableName): TerminologyTable => {
    const found = built.get(name);
    if (!found) throw new Error(`Missing terminology table: ${name}`);
    return found;
  };

  return Object.freeze({
    medications: table('medications'),
    labs: table('labs'),
    vitals: table('vitals'),
    procedures: table('procedures'),
    routes: table('routes'),
    devices: table('devices'),
  });
}

export function loadTerminologyTables(dir: string = config.terminology.dir): TerminologyTables {
  const files = TERMINOLOGY_FILES.map((file) => {
    const raw: unknown = JSON.parse(readFileSync(join(dir, file), 'utf8'));
    const parsed = TerminologyFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid terminology file ${file}: ${parsed.error.message}`);
    }
    return parsed.data;
  });
  return buildTerminologyTables(files);
}
