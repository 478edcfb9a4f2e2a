import type fhir4 from 'fhir/r4';
import { anchorReference } from '@notefhir/shared';
import type {
  AssembledBundle,
  BundleEntry,
  BundleSummary,
  FhirResourceBody,
  FhirTransactionBundle,
  FhirTransactionEntry,
  ResolvedRef,
} from '@notefhir/shared';
import { isReducedRecord } from '../factories/record-fields.js';

export function referenceValue(ref: ResolvedRef): fhir4.Reference {
  return ref.kind === 'bundle'
    ? { reference: anchorReference(ref.internalId) }
    : { reference: ref.reference };
}

/**
 * Assign `value` at a dotted path such as `performer.0.actor`, creating
 * arrays for numeric segments and objects otherwise.
 */
export function setAtPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const segments = path.split('.');
  let cursor: object = target;
  segments.forEach((segment, i) => {
    const next = segments[i + 1];
    if (next === undefined) {
      Reflect.set(cursor, segment, value);
      return;
    }
    const existing: unknown = Reflect.get(cursor, segment);
    if (typeof existing === 'object' && existing !== null) {
      cursor = existing;
      return;
    }
    const created = /^\d+$/.test(next) ? [] : {};
    Reflect.set(cursor, segment, created);
    cursor = created;
  });
}

export function renderResource(entry: BundleEntry): FhirResourceBody {
  const body: Record<string, unknown> = structuredClone(entry.record.fields);
  for (const [path, ref] of Object.entries(entry.record.references)) {
    setAtPath(body, path, referenceValue(ref));
  }
  return { resourceType: entry.record.recordType, id: entry.internalId, ...body };
}

export function renderEntry(entry: BundleEntry): FhirTransactionEntry {
  return {
    fullUrl: entry.anchorReference,
    resource: renderResource(entry),
    request: { method: entry.httpMethod, url: entry.record.recordType },
  };
}

/** Wire form of an assembled bundle, entries in assembly order. */
export function renderBundle(bundle: AssembledBundle, timestamp?: string): FhirTransactionBundle {
  return {
    resourceType: 'Bundle',
    type: bundle.type,
    ...(timestamp ? { timestamp } : {}),
    entry: bundle.entries.map(renderEntry),
  };
}

export function summarizeBundle(bundle: AssembledBundle): BundleSummary {
  const resourceCounts: Record<string, number> = {};
  let reducedEntries = 0;
  for (const entry of bundle.entries) {
    const type = entry.record.recordType;
    resourceCounts[type] = (resourceCounts[type] ?? 0) + 1;
    if (isReducedRecord(entry.record)) reducedEntries += 1;
  }
  return { totalEntries: bundle.entries.length, resourceCounts, reducedEntries };
}
