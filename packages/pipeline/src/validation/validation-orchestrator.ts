import { issueEntryIndex } from '@notefhir/shared';
import type {
  AssembledBundle,
  BundleEntry,
  EntryRepair,
  OperationOutcomeIssue,
  RemoteValidationStatus,
  ValidationIssue,
  ValidationReport,
} from '@notefhir/shared';
import type { RemoteValidator } from '../adapters/fhir-validator-client.js';
import { renderBundle } from '../assembly/fhir-document.js';
import { toBundleEntry } from '../assembly/bundle-assembler.js';
import type { FactoryRegistry } from '../factories/factory-registry.js';
import { silentLogger, type PipelineLogger } from '../logger.js';
import { checkRequiredFields, runLocalChecks } from './local-checks.js';

export interface ValidationOrchestratorOptions {
  registry: FactoryRegistry;
  /** Remote `$validate` is skipped when absent. */
  remote?: RemoteValidator;
  logger?: PipelineLogger;
}

export interface RepairedBundle {
  bundle: AssembledBundle;
  report: ValidationReport;
}

interface RemoteVerdict {
  status: RemoteValidationStatus;
  reason?: string;
  issues: ValidationIssue[];
}

/** An entry index past the end of the bundle is reported as a bundle-level issue. */
function toValidationIssue(raw: OperationOutcomeIssue, entryCount: number): ValidationIssue {
  const entryIndex = issueEntryIndex(raw);
  return {
    severity: raw.severity === 'fatal' ? 'error' : raw.severity,
    code: 'remote',
    source: 'remote',
    entryIndex: entryIndex !== undefined && entryIndex < entryCount ? entryIndex : undefined,
    path: raw.expression?.[0] ?? raw.location?.[0] ?? '',
    message: raw.diagnostics ?? raw.details?.text ?? raw.code,
  };
}

function entriesWithErrors(issues: readonly ValidationIssue[]): number[] {
  const indices = new Set<number>();
  for (const issue of issues) {
    if (issue.severity === 'error' && issue.entryIndex !== undefined) indices.add(issue.entryIndex);
  }
  return [...indices].sort((a, b) => a - b);
}

/**
 * Local structural checks, the optional remote `$validate` call, and
 * per-entry repair through the reduced builders.
 */
export class ValidationOrchestrator {
  private readonly registry: FactoryRegistry;
  private readonly remote?: RemoteValidator;
  private readonly logger: PipelineLogger;

  constructor(options: ValidationOrchestratorOptions) {
    this.registry = options.registry;
    this.remote = options.remote;
    this.logger = options.logger ?? silentLogger;
  }

  get remoteEnabled(): boolean {
    return this.remote !== undefined;
  }

  async validate(bundle: AssembledBundle): Promise<ValidationReport> {
    const localIssues = runLocalChecks(bundle);
    const remote = await this.validateRemotely(bundle);
    const issues = [...localIssues, ...remote.issues];
    const localStatus = localIssues.some((i) => i.severity === 'error') ? 'invalid' : 'valid';

    return {
      valid: localStatus === 'valid' && remote.status !== 'invalid',
      localStatus,
      remoteStatus: remote.status,
      ...(remote.reason ? { remoteReason: remote.reason } : {}),
      issues,
      repairs: [],
      unresolvedEntries: entriesWithErrors(issues),
    };
  }

  /**
   * Replace every entry that fails a required-field check, or that a remote
   * error names, with the reduced form of its record. Internal ids and entry
   * order do not change. The remote verdict is not re-requested.
   */
  async validateAndRepair(bundle: AssembledBundle): Promise<RepairedBundle> {
    const initial = await this.validate(bundle);

    const triggers = new Map<number, EntryRepair['trigger']>();
    for (const issue of initial.issues) {
      if (issue.entryIndex === undefined || issue.severity !== 'error') continue;
      if (issue.source === 'local' && issue.code === 'required') {
        triggers.set(issue.entryIndex, 'local');
      } else if (issue.source === 'remote' && !triggers.has(issue.entryIndex)) {
        triggers.set(issue.entryIndex, 'remote');
      }
    }

    if (triggers.size === 0) {
      return { bundle, report: initial };
    }

    const entries = [...bundle.entries];
    const repairs: EntryRepair[] = [];
    for (const [entryIndex, trigger] of [...triggers].sort(([a], [b]) => a - b)) {
      const entry = entries[entryIndex];
      if (!entry) continue;
      const replacement = this.reduceEntry(entry, bundle.keyIndex);
      entries[entryIndex] = replacement ?? entry;

      const repair: EntryRepair = {
        entryIndex,
        internalId: entry.internalId,
        recordType: entry.record.recordType,
        trigger,
        unresolved: replacement === undefined || checkRequiredFields(replacement, entryIndex).length > 0,
        droppedReferences: replacement
          ? Object.keys(entry.record.references).filter((path) => !(path in replacement.record.references))
          : [],
      };
      repairs.push(repair);
      this.logger.warn(
        { entryIndex, recordType: repair.recordType, trigger, unresolved: repair.unresolved },
        'Replaced bundle entry with its reduced form',
      );
    }

    const repaired: AssembledBundle = { ...bundle, entries };
    const localIssues = runLocalChecks(repaired);
    const remoteIssues = initial.issues.filter((i) => i.source === 'remote');
    const unresolvedEntries = repairs.filter((r) => r.unresolved).map((r) => r.entryIndex);
    const localStatus = localIssues.some((i) => i.severity === 'error') ? 'invalid' : 'valid';

    return {
      bundle: repaired,
      report: {
        valid: localStatus === 'valid' && unresolvedEntries.length === 0,
        localStatus,
        remoteStatus: initial.remoteStatus,
        ...(initial.remoteReason ? { remoteReason: initial.remoteReason } : {}),
        issues: [...localIssues, ...remoteIssues],
        repairs,
        unresolvedEntries,
      },
    };
  }

  private async validateRemotely(bundle: AssembledBundle): Promise<RemoteVerdict> {
    if (!this.remote) {
      return { status: 'skipped', issues: [] };
    }
    const result = await this.remote.validate(renderBundle(bundle));
    if (result.status === 'unavailable') {
      this.logger.warn({ reason: result.reason }, 'Remote validation unavailable');
      return { status: 'unknown', reason: result.reason, issues: [] };
    }
    const issues = result.outcome.issue.map((raw) => toValidationIssue(raw, bundle.entries.length));
    return {
      status: issues.some((i) => i.severity === 'error') ? 'invalid' : 'valid',
      issues,
    };
  }

  /** Rebuilt entry, or undefined when the record cannot be rebuilt (no origin or builder). */
  private reduceEntry(entry: BundleEntry, keyIndex: ReadonlyMap<string, string>): BundleEntry | undefined {
    const { origin, recordType } = entry.record;
    if (!origin || !this.registry.has(recordType)) return undefined;
    const reduced = this.registry.buildReduced(recordType, origin.entity, origin.concept, origin.context);
    return toBundleEntry(reduced, entry.internalId, keyIndex);
  }
}
