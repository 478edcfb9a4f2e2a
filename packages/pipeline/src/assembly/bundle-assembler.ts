import { randomUUID } from 'node:crypto';
import { anchorReference } from '@notefhir/shared';
import type {
  AssembledBundle,
  BundleEntry,
  PipelineRecord,
  RecordRef,
  ResolvedRef,
} from '@notefhir/shared';
import { AssemblyError, DanglingReferenceError } from '../errors.js';
import { categoryOf } from './categories.js';
import { buildDependencyGraph, topologicalOrder } from './dependency-graph.js';

export type AssemblyResult =
  | { success: true; bundle: AssembledBundle }
  | { success: false; error: AssemblyError };

export interface BundleAssemblerOptions {
  /** Internal id source; defaults to random UUIDs. */
  generateId?: () => string;
}

/**
 * Swap every local key for the internal id of the entry that carries it.
 * Concrete references pass through untouched.
 */
export function rewriteReferences(
  owner: string,
  references: Readonly<Record<string, RecordRef>>,
  keyIndex: ReadonlyMap<string, string>,
): Record<string, ResolvedRef> {
  const rewritten: Record<string, ResolvedRef> = {};
  for (const [path, ref] of Object.entries(references)) {
    if (ref.kind === 'concrete') {
      rewritten[path] = ref;
      continue;
    }
    const internalId = keyIndex.get(ref.localKey);
    if (internalId === undefined) {
      throw new DanglingReferenceError(owner, path, ref.localKey);
    }
    rewritten[path] = { kind: 'bundle', internalId };
  }
  return rewritten;
}

export function toBundleEntry(
  record: PipelineRecord,
  internalId: string,
  keyIndex: ReadonlyMap<string, string>,
): BundleEntry {
  return {
    internalId,
    httpMethod: 'POST',
    anchorReference: anchorReference(internalId),
    record: {
      ...record,
      references: rewriteReferences(record.localKey, record.references, keyIndex),
    },
  };
}

/**
 * Orders records so every entry comes after the entries it references,
 * mints internal ids in that order and rewrites local references to them.
 * Stateless apart from the id generator; the input is never mutated.
 */
export class BundleAssembler {
  private readonly generateId: () => string;

  constructor(options: BundleAssemblerOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
  }

  assemble(records: readonly PipelineRecord[]): AssemblyResult {
    try {
      const graph = buildDependencyGraph(records);
      const order = topologicalOrder(records, graph, (record) => categoryOf(record.recordType));

      const minted: Array<{ record: PipelineRecord; internalId: string }> = [];
      const keyIndex = new Map<string, string>();
      for (const i of order) {
        const record = records[i];
        if (!record) continue;
        const internalId = this.generateId();
        minted.push({ record, internalId });
        keyIndex.set(record.localKey, internalId);
      }

      const entries = minted.map(({ record, internalId }) => toBundleEntry(record, internalId, keyIndex));

      return { success: true, bundle: { type: 'transaction', entries, keyIndex } };
    } catch (error) {
      if (error instanceof AssemblyError) {
        return { success: false, error };
      }
      throw error;
    }
  }
}
