export const ENTITY_KINDS = [
  'Patient',
  'Medication',
  'Dosage',
  'Route',
  'Device',
  'LabTest',
  'Observation',
  'Procedure',
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export interface SourceOffset {
  /** Inclusive start, in UTF-16 code units of the original text. */
  readonly start: number;
  /** Exclusive end. */
  readonly end: number;
}

export interface ExtractedEntity {
  readonly kind: EntityKind;
  /** Span of the original text, original casing preserved. */
  readonly rawText: string;
  /** Lower-cased, whitespace-collapsed surface form used for terminology lookup. */
  readonly normalizedText: string;
  readonly sourceOffset: SourceOffset;
  readonly confidence: number;
  /** Id of the pattern rule that produced the match. */
  readonly rule: string;
}

/**
 * A coded concept. `code === ''` with a non-empty `text` is a text-only
 * fallback: the surface string did not map to any terminology table.
 */
export interface CodedConcept {
  readonly system: string;
  readonly code: string;
  readonly display: string;
  readonly text: string;
}

export type RecordFields = Record<string, unknown>;

export type RecordRef =
  | { readonly kind: 'concrete'; readonly reference: string }
  | { readonly kind: 'local'; readonly localKey: string };

/** A reference after assembly: untouched concrete id, or an entry of the same bundle. */
export type ResolvedRef =
  | { readonly kind: 'concrete'; readonly reference: string }
  | { readonly kind: 'bundle'; readonly internalId: string };

/**
 * One structured record before (TRef = RecordRef) or after (TRef = ResolvedRef)
 * bundle assembly. `references` maps a dotted field path of the resource
 * (e.g. `subject`, `performer.0.actor`) to the record it points at.
 */
export interface PipelineRecord<TRef = RecordRef> {
  readonly recordType: string;
  readonly localKey: string;
  readonly fields: RecordFields;
  readonly references: Readonly<Record<string, TRef>>;
  /** Present on records built by the factory registry; enables reduced rebuilds. */
  readonly origin?: RecordOrigin;
}

export interface RecordOrigin {
  readonly entity: ExtractedEntity;
  readonly concept: CodedConcept;
  readonly context: BuildContext;
  readonly reduced: boolean;
}

export interface TimingRepeat {
  readonly frequency: number;
  readonly period: number;
  readonly periodUnit: 'h' | 'd' | 'wk';
}

export interface FrequencyModifier {
  readonly text: string;
  readonly repeat?: TimingRepeat;
  readonly asNeeded: boolean;
}

export interface DosageModifiers {
  readonly dosage?: ExtractedEntity;
  readonly route?: ExtractedEntity;
  readonly routeConcept?: CodedConcept;
  readonly frequency?: FrequencyModifier;
}

export interface BuildContext {
  /** Key the built record is known by inside its bundle. */
  readonly localKey: string;
  readonly requestId?: string;
  readonly references: {
    readonly patient?: RecordRef;
    readonly practitioner?: RecordRef;
    readonly request?: RecordRef;
    readonly device?: RecordRef;
  };
  /** Local keys of every record planned for the same bundle. */
  readonly knownLocalKeys: ReadonlySet<string>;
  readonly status?: string;
  readonly category?: string;
  /** FHIR dateTime stamped on authoredOn / effective / recorded fields. */
  readonly recordedAt?: string;
  readonly modifiers?: DosageModifiers;
}
