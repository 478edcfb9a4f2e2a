import { isConcreteReference } from '@notefhir/shared';
import type { RecordRef } from '@notefhir/shared';

export function concreteRef(reference: string): RecordRef {
  return { kind: 'concrete', reference };
}

export function localRef(localKey: string): RecordRef {
  return { kind: 'local', localKey };
}

export function isResolvable(ref: RecordRef, knownLocalKeys: ReadonlySet<string>): boolean {
  switch (ref.kind) {
    case 'concrete':
      return isConcreteReference(ref.reference);
    case 'local':
      return knownLocalKeys.has(ref.localKey);
  }
}

export function describeRef(ref: RecordRef): string {
  return ref.kind === 'concrete'
    ? `"${ref.reference}" is not a well-formed reference`
    : `local key "${ref.localKey}" is not planned in this bundle`;
}

export interface PartitionedReferences {
  resolved: Record<string, RecordRef>;
  unresolved: Array<{ path: string; ref: RecordRef }>;
}

export function partitionReferences(
  refs: Readonly<Record<string, RecordRef | undefined>>,
  knownLocalKeys: ReadonlySet<string>,
): PartitionedReferences {
  const resolved: Record<string, RecordRef> = {};
  const unresolved: Array<{ path: string; ref: RecordRef }> = [];
  for (const [path, ref] of Object.entries(refs)) {
    if (!ref) continue;
    if (isResolvable(ref, knownLocalKeys)) {
      resolved[path] = ref;
    } else {
      unresolved.push({ path, ref });
    }
  }
  return { resolved, unresolved };
}
