import { isFallbackConcept, sha256, toFhirDateTime } from '@notefhir/shared';
import type {
  BundleSummary,
  ConversionRequest,
  ExtractedEntity,
  FhirTransactionBundle,
  PipelineRecord,
  ValidationReport,
} from '@notefhir/shared';
import { FhirValidatorClient, type RemoteValidator } from './adapters/fhir-validator-client.js';
import { BundleAssembler } from './assembly/bundle-assembler.js';
import { renderBundle, summarizeBundle } from './assembly/fhir-document.js';
import { RecordPlanner, type PlannedRecord } from './composition/record-planner.js';
import { config } from './config.js';
import { isPipelineError } from './errors.js';
import { EntityExtractor } from './extraction/entity-extractor.js';
import { loadLexicon } from './extraction/lexicon.js';
import { DEFAULT_RECORD_TYPES, createDefaultRegistry, type FactoryRegistry } from './factories/factory-registry.js';
import { buildProvenanceRecord } from './factories/provenance.js';
import { localRef } from './factories/references.js';
import { createLogger, type PipelineLogger } from './logger.js';
import { TerminologyMapper } from './terminology/terminology-mapper.js';
import { loadTerminologyTables } from './terminology/terminology-tables.js';
import { ValidationOrchestrator } from './validation/validation-orchestrator.js';

export interface ConversionResult {
  bundle: FhirTransactionBundle;
  report: ValidationReport;
  entities: ExtractedEntity[];
  summary: BundleSummary;
}

export type BatchItemResult =
  | { status: 'fulfilled'; requestId?: string; result: ConversionResult }
  | { status: 'rejected'; requestId?: string; error: { code: string; message: string; retryable: boolean } };

export interface PipelineDependencies {
  extractor: EntityExtractor;
  planner: RecordPlanner;
  registry: FactoryRegistry;
  assembler: BundleAssembler;
  orchestrator: ValidationOrchestrator;
  logger: PipelineLogger;
  includeProvenance?: boolean;
  now?: () => Date;
}

function describeFailure(reason: unknown): { code: string; message: string; retryable: boolean } {
  if (isPipelineError(reason)) {
    return { code: reason.code, message: reason.message, retryable: reason.retryable };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: reason instanceof Error ? reason.message : String(reason),
    retryable: false,
  };
}

/**
 * Clinical note → FHIR transaction bundle. Every stage but the remote
 * validation call is synchronous; one instance serves concurrent requests.
 */
export class ClinicalNotePipeline {
  private readonly extractor: EntityExtractor;
  private readonly planner: RecordPlanner;
  private readonly registry: FactoryRegistry;
  private readonly assembler: BundleAssembler;
  private readonly orchestrator: ValidationOrchestrator;
  private readonly logger: PipelineLogger;
  private readonly includeProvenance: boolean;
  private readonly now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.extractor = deps.extractor;
    this.planner = deps.planner;
    this.registry = deps.registry;
    this.assembler = deps.assembler;
    this.orchestrator = deps.orchestrator;
    this.logger = deps.logger;
    this.includeProvenance = deps.includeProvenance ?? false;
    this.now = deps.now ?? (() => new Date());
  }

  get remoteValidationEnabled(): boolean {
    return this.orchestrator.remoteEnabled;
  }

  extract(text: string): ExtractedEntity[] {
    return this.extractor.extract(text);
  }

  /** Throws only AssemblyError (cycle, dangling or duplicate keys). */
  async convert(input: ConversionRequest): Promise<ConversionResult> {
    const { requestId } = input;
    const startedAt = Date.now();
    const recordedAt = toFhirDateTime(this.now());

    const entities = this.extractor.extract(input.text);
    this.logger.debug(
      { requestId, textHash: sha256(input.text), entityCount: entities.length },
      'Extracted entities',
    );

    const plan = this.planner.plan({
      text: input.text,
      entities,
      recordedAt,
      requestId,
      patientReference: input.patientReference,
      practitionerReference: input.practitionerReference,
    });
    const unmapped = plan.records.filter((r) => r.entity.kind !== 'Patient' && isFallbackConcept(r.concept));
    if (unmapped.length > 0) {
      this.logger.debug(
        { requestId, unmapped: unmapped.map((r) => r.context.localKey) },
        'No terminology match; using text-only concepts',
      );
    }
    if (plan.unlinkedModifiers.length > 0) {
      this.logger.debug(
        { requestId, unlinked: plan.unlinkedModifiers.map((m) => m.kind) },
        'Dropped modifiers with no medication in their sentence',
      );
    }

    const records = plan.records.map((planned) => this.buildRecord(planned, requestId));
    if (this.includeProvenance && records.length > 0) {
      records.push(
        buildProvenanceRecord({
          localKey: 'provenance-0',
          targets: records.map((record) => localRef(record.localKey)),
          recordedAt,
          requestId,
        }),
      );
    }

    const assembled = this.assembler.assemble(records);
    if (!assembled.success) {
      this.logger.warn({ requestId, code: assembled.error.code, err: assembled.error }, 'Bundle assembly failed');
      throw assembled.error;
    }

    const { bundle, report } = await this.orchestrator.validateAndRepair(assembled.bundle);
    const summary = summarizeBundle(bundle);

    this.logger.info(
      {
        requestId,
        textHash: sha256(input.text),
        entries: summary.totalEntries,
        reduced: summary.reducedEntries,
        valid: report.valid,
        remoteStatus: report.remoteStatus,
        durationMs: Date.now() - startedAt,
      },
      'Converted clinical note',
    );

    return { bundle: renderBundle(bundle, recordedAt), report, entities, summary };
  }

  /** Converts independent notes concurrently; one failure does not affect the others. */
  async convertBatch(inputs: readonly ConversionRequest[]): Promise<BatchItemResult[]> {
    const settled = await Promise.allSettled(inputs.map((input) => this.convert(input)));
    return settled.map((outcome, i): BatchItemResult => {
      const requestId = inputs[i]?.requestId;
      if (outcome.status === 'fulfilled') {
        return { status: 'fulfilled', requestId, result: outcome.value };
      }
      this.logger.warn({ requestId, err: outcome.reason }, 'Batch item failed');
      return { status: 'rejected', requestId, error: describeFailure(outcome.reason) };
    });
  }

  private buildRecord(planned: PlannedRecord, requestId: string | undefined): PipelineRecord {
    const { recordType, entity, concept, context } = planned;
    if (planned.reduced) {
      return this.registry.buildReduced(recordType, entity, concept, context);
    }
    const { record, recoveredFrom } = this.registry.buildOrReduce(recordType, entity, concept, context);
    if (recoveredFrom) {
      this.logger.warn(
        { requestId, recordType, localKey: context.localKey, reason: recoveredFrom.message },
        'Built reduced record after structural error',
      );
    }
    return record;
  }
}

export interface CreatePipelineOptions {
  logger?: PipelineLogger;
  /** Remote `$validate` endpoint; empty disables the remote check. */
  validatorUrl?: string;
  validatorTimeoutMs?: number;
  /** Overrides the HTTP client built from `validatorUrl`. */
  remoteValidator?: RemoteValidator;
  terminologyDir?: string;
  lexiconPath?: string;
  includeProvenance?: boolean;
  registry?: FactoryRegistry;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * Loads the lexicon and terminology tables once and wires every stage.
 * Fails at construction when the registry lacks a builder the planner needs.
 */
export function createPipeline(options: CreatePipelineOptions = {}): ClinicalNotePipeline {
  const logger = options.logger ?? createLogger();
  const lexicon = loadLexicon(options.lexiconPath ?? config.extraction.lexiconPath);
  const mapper = new TerminologyMapper(loadTerminologyTables(options.terminologyDir ?? config.terminology.dir));

  const registry = options.registry ?? createDefaultRegistry();
  registry.assertSupports(DEFAULT_RECORD_TYPES);

  const validatorUrl = options.validatorUrl ?? config.validator.url;
  const remote =
    options.remoteValidator ??
    (validatorUrl
      ? new FhirValidatorClient({ baseUrl: validatorUrl, timeoutMs: options.validatorTimeoutMs })
      : undefined);

  logger.info(
    { recordTypes: registry.recordTypes, remoteValidation: remote ? 'enabled' : 'disabled' },
    'Clinical note pipeline ready',
  );

  return new ClinicalNotePipeline({
    extractor: new EntityExtractor(lexicon),
    planner: new RecordPlanner(mapper, lexicon),
    registry,
    assembler: new BundleAssembler({ generateId: options.generateId }),
    orchestrator: new ValidationOrchestrator({ registry, remote, logger }),
    logger,
    includeProvenance: options.includeProvenance ?? config.bundle.includeProvenance,
    now: options.now,
  });
}
