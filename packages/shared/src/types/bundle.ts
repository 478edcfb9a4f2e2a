import type { PipelineRecord, ResolvedRef } from './fhir-mapping.js';

export interface BundleEntry {
  readonly internalId: string;
  readonly record: PipelineRecord<ResolvedRef>;
  readonly httpMethod: 'POST';
  readonly anchorReference: `urn:uuid:${string}`;
}

export interface AssembledBundle {
  readonly type: 'transaction';
  readonly entries: readonly BundleEntry[];
  /** localKey → internalId for every entry, fixed at assembly time. */
  readonly keyIndex: ReadonlyMap<string, string>;
}

/** Wire shapes of the emitted FHIR document. */
export interface FhirResourceBody {
  resourceType: string;
  id?: string;
  [field: string]: unknown;
}

export interface FhirTransactionEntry {
  fullUrl: string;
  resource: FhirResourceBody;
  request: { method: 'POST'; url: string };
}

export interface FhirTransactionBundle {
  resourceType: 'Bundle';
  type: 'transaction';
  timestamp?: string;
  entry: FhirTransactionEntry[];
}

export interface BundleSummary {
  totalEntries: number;
  resourceCounts: Record<string, number>;
  reducedEntries: number;
}
