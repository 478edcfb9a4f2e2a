import type { PipelineRecord } from '@notefhir/shared';
import { DanglingReferenceError, DependencyCycleError, DuplicateLocalKeyError } from '../errors.js';

export interface DependencyGraph {
  /** localKey → record index */
  readonly indexByKey: ReadonlyMap<string, number>;
  /** For each record, the indices of the records it references. */
  readonly dependsOn: readonly ReadonlySet<number>[];
}

/**
 * Edges run from a record to every record it references locally. A record
 * pointing at its own key adds no edge.
 */
export function buildDependencyGraph(records: readonly PipelineRecord[]): DependencyGraph {
  const indexByKey = new Map<string, number>();
  records.forEach((record, i) => {
    if (indexByKey.has(record.localKey)) {
      throw new DuplicateLocalKeyError(record.localKey);
    }
    indexByKey.set(record.localKey, i);
  });

  const dependsOn = records.map((record, i) => {
    const targets = new Set<number>();
    for (const [path, ref] of Object.entries(record.references)) {
      if (ref.kind !== 'local') continue;
      const target = indexByKey.get(ref.localKey);
      if (target === undefined) {
        throw new DanglingReferenceError(record.localKey, path, ref.localKey);
      }
      if (target !== i) targets.add(target);
    }
    return targets;
  });

  return { indexByKey, dependsOn };
}

/** Local keys of one cycle among the given nodes, first key repeated at the end. */
function findCycle(
  records: readonly PipelineRecord[],
  graph: DependencyGraph,
  nodes: ReadonlySet<number>,
): string[] {
  const state = new Map<number, 'visiting' | 'done'>();
  const stack: number[] = [];

  const visit = (node: number): number[] | undefined => {
    state.set(node, 'visiting');
    stack.push(node);
    for (const next of graph.dependsOn[node] ?? []) {
      if (!nodes.has(next)) continue;
      if (state.get(next) === 'visiting') {
        return [...stack.slice(stack.indexOf(next)), next];
      }
      if (!state.has(next)) {
        const found = visit(next);
        if (found) return found;
      }
    }
    stack.pop();
    state.set(node, 'done');
    return undefined;
  };

  for (const node of [...nodes].sort((a, b) => a - b)) {
    if (state.has(node)) continue;
    const cycle = visit(node);
    if (cycle) return cycle.map((i) => records[i]?.localKey ?? String(i));
  }
  return [];
}

/**
 * Kahn's algorithm. Among records whose dependencies are already placed, the
 * one with the lowest (priority, index) goes next.
 */
export function topologicalOrder(
  records: readonly PipelineRecord[],
  graph: DependencyGraph,
  priority: (record: PipelineRecord) => number,
): number[] {
  const remainingDeps = graph.dependsOn.map((deps) => deps.size);
  const dependents = records.map((): number[] => []);
  graph.dependsOn.forEach((deps, i) => {
    for (const dep of deps) dependents[dep]?.push(i);
  });

  const rank = (i: number) => {
    const record = records[i];
    return record ? priority(record) : Infinity;
  };
  const ready = records.map((_, i) => i).filter((i) => remainingDeps[i] === 0);
  const order: number[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => rank(a) - rank(b) || a - b);
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents[next] ?? []) {
      const left = (remainingDeps[dependent] ?? 0) - 1;
      remainingDeps[dependent] = left;
      if (left === 0) ready.push(dependent);
    }
  }

  if (order.length < records.length) {
    const placed = new Set(order);
    const blocked = new Set(records.map((_, i) => i).filter((i) => !placed.has(i)));
    throw new DependencyCycleError(findCycle(records, graph, blocked));
  }
  return order;
}
