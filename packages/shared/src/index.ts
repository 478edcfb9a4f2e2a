// Types
export { ENTITY_KINDS } from './types/fhir-mapping.js';
export type {
  EntityKind,
  SourceOffset,
  ExtractedEntity,
  CodedConcept,
  RecordFields,
  RecordRef,
  ResolvedRef,
  PipelineRecord,
  RecordOrigin,
  TimingRepeat,
  FrequencyModifier,
  DosageModifiers,
  BuildContext,
} from './types/fhir-mapping.js';

export type {
  BundleEntry,
  AssembledBundle,
  FhirResourceBody,
  FhirTransactionEntry,
  FhirTransactionBundle,
  BundleSummary,
} from './types/bundle.js';

export type {
  IssueSeverity,
  IssueCode,
  ValidationIssue,
  RemoteValidationStatus,
  EntryRepair,
  ValidationReport,
} from './types/validation.js';

// Schemas
export {
  MAX_NOTE_LENGTH,
  ConversionRequestSchema,
  BatchConversionRequestSchema,
} from './schemas/conversion.schema.js';
export type { ConversionRequest, BatchConversionRequest } from './schemas/conversion.schema.js';
export {
  OperationOutcomeIssueSchema,
  OperationOutcomeSchema,
  issueEntryIndex,
} from './schemas/operation-outcome.schema.js';
export type { OperationOutcome, OperationOutcomeIssue } from './schemas/operation-outcome.schema.js';

// Constants
export { CODE_SYSTEMS, SNOMED_CATEGORY_CODES, PLACEHOLDER_CODE_PATTERN } from './constants/terminology.js';

// Utils
export { sha256 } from './utils/hash.js';
export { toFhirDateTime, isFhirDateTime } from './utils/date.js';
export {
  isConcreteReference,
  anchorReference,
  fallbackConcept,
  isFallbackConcept,
  toCodeableConcept,
  generatedNarrative,
} from './utils/fhir-helpers.js';
