export { config } from './config.js';
export type { PipelineConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { PipelineLogger } from './logger.js';
export {
  PipelineError,
  AssemblyError,
  DependencyCycleError,
  DanglingReferenceError,
  DuplicateLocalKeyError,
  RegistryConfigurationError,
  BuilderStructuralError,
  isPipelineError,
} from './errors.js';

export { EntityExtractor } from './extraction/entity-extractor.js';
export { loadLexicon, parseLexicon, LexiconSchema } from './extraction/lexicon.js';
export type { Lexicon } from './extraction/lexicon.js';

export { TerminologyMapper } from './terminology/terminology-mapper.js';
export { loadTerminologyTables, buildTerminologyTables, TABLE_NAMES } from './terminology/terminology-tables.js';
export type { TerminologyTables, TerminologyFile, TableName } from './terminology/terminology-tables.js';

export type { Builder, BuildResult } from './factories/builder.js';
export { RecordBuilder } from './factories/record-builder.js';
export { FactoryRegistry, DEFAULT_RECORD_TYPES, createDefaultRegistry } from './factories/factory-registry.js';
export type { RegistryBuildOutcome } from './factories/factory-registry.js';
export { concreteRef, localRef } from './factories/references.js';

export { RecordPlanner } from './composition/record-planner.js';
export type { PlanInput, PlannedRecord, RecordPlan } from './composition/record-planner.js';

export { BundleAssembler } from './assembly/bundle-assembler.js';
export type { AssemblyResult, BundleAssemblerOptions } from './assembly/bundle-assembler.js';
export { renderBundle, summarizeBundle } from './assembly/fhir-document.js';

export { ValidationOrchestrator } from './validation/validation-orchestrator.js';
export type { ValidationOrchestratorOptions, RepairedBundle } from './validation/validation-orchestrator.js';
export { FhirValidatorClient } from './adapters/fhir-validator-client.js';
export type { RemoteValidator, RemoteValidationResult } from './adapters/fhir-validator-client.js';

export { LegacyResourceAdapter } from './mapping/legacy-resource-adapter.js';

export { ClinicalNotePipeline, createPipeline } from './pipeline.js';
export type { ConversionResult, BatchItemResult, CreatePipelineOptions, PipelineDependencies } from './pipeline.js';
