import type {
  BuildContext,
  CodedConcept,
  DosageModifiers,
  ExtractedEntity,
  FrequencyModifier,
  RecordRef,
  SourceOffset,
} from '@notefhir/shared';
import type { Lexicon } from '../extraction/lexicon.js';
import { findFrequencies } from '../extraction/frequency.js';
import { normalizeForMatching, termAlternation } from '../extraction/normalize.js';
import { sentenceIndexAt, splitSentences } from '../extraction/sentences.js';
import { concreteRef, localRef } from '../factories/references.js';
import type { TerminologyMapper } from '../terminology/terminology-mapper.js';

export interface PlanInput {
  text: string;
  entities: readonly ExtractedEntity[];
  recordedAt: string;
  requestId?: string;
  /** Concrete reference used when the text names no patient. */
  patientReference?: string;
  practitionerReference?: string;
}

export interface PlannedRecord {
  recordType: string;
  entity: ExtractedEntity;
  concept: CodedConcept;
  context: BuildContext;
  /** Build straight to the reduced form (the anonymous patient). */
  reduced: boolean;
}

export interface RecordPlan {
  records: PlannedRecord[];
  /** Dosage and route mentions with no medication in their sentence. */
  unlinkedModifiers: ExtractedEntity[];
}

interface Draft {
  recordType: string;
  entity: ExtractedEntity;
  localKey: string;
  references: BuildContext['references'];
  category?: string;
  modifiers?: DosageModifiers;
  reduced?: boolean;
}

const ANONYMOUS_PATIENT: ExtractedEntity = Object.freeze({
  kind: 'Patient',
  rawText: '',
  normalizedText: '',
  sourceOffset: Object.freeze({ start: 0, end: 0 }),
  confidence: 0,
  rule: 'anonymous-patient',
});

/** Gap between two spans; 0 when they touch or overlap. */
function gap(a: SourceOffset, b: SourceOffset): number {
  if (b.start >= a.end) return b.start - a.end;
  if (a.start >= b.end) return a.start - b.end;
  return 0;
}

interface Linkable {
  sourceOffset: SourceOffset;
}

interface Link<T> {
  gap: number;
  value: T;
}

interface ModifierSlots {
  dosage?: Link<ExtractedEntity>;
  route?: Link<ExtractedEntity>;
  frequency?: Link<FrequencyModifier>;
}

function closer<T>(current: Link<T> | undefined, next: Link<T>): Link<T> {
  return current && current.gap <= next.gap ? current : next;
}

/**
 * Decides which records the entities of one note become, and how those
 * records point at each other.
 */
export class RecordPlanner {
  private readonly administrationCue: RegExp;

  constructor(
    private readonly mapper: TerminologyMapper,
    lexicon: Lexicon,
  ) {
    this.administrationCue = new RegExp(
      `(?<![a-z0-9])(?:${termAlternation(lexicon.administrationCues)})(?![a-z0-9])`,
    );
  }

  plan(input: PlanInput): RecordPlan {
    const { text, entities } = input;
    const normalized = normalizeForMatching(text);
    const sentences = splitSentences(text);
    const sentenceOf = (target: Linkable) => sentenceIndexAt(sentences, target.sourceOffset.start);

    const patients = entities.filter((e) => e.kind === 'Patient');
    const medications = entities.filter((e) => e.kind === 'Medication');
    const devices = entities.filter((e) => e.kind === 'Device');

    const drafts: Draft[] = [];
    const keyOf = new Map<ExtractedEntity, string>();
    const counters = new Map<string, number>();
    const nextKey = (prefix: string) => {
      const n = counters.get(prefix) ?? 0;
      counters.set(prefix, n + 1);
      return `${prefix}-${n}`;
    };

    for (const patient of patients) keyOf.set(patient, nextKey('patient'));
    for (const device of devices) keyOf.set(device, nextKey('device'));

    const fallbackPatient = this.fallbackPatient(input, patients, drafts, nextKey);
    const practitioner = input.practitionerReference ? concreteRef(input.practitionerReference) : undefined;

    const patientFor = (entity: ExtractedEntity): RecordRef | undefined => {
      const preceding = patients.filter((p) => p.sourceOffset.start <= entity.sourceOffset.start).at(-1);
      const chosen = preceding ?? patients[0];
      const key = chosen ? keyOf.get(chosen) : undefined;
      return key ? localRef(key) : fallbackPatient;
    };

    const { modifiers, unlinked } = this.linkModifiers(entities, medications, normalized, sentenceOf);

    for (const entity of entities) {
      switch (entity.kind) {
        case 'Patient':
          drafts.push({
            recordType: 'Patient',
            entity,
            localKey: keyOf.get(entity) ?? nextKey('patient'),
            references: {},
          });
          break;
        case 'Medication': {
          const requestKey = nextKey('medication');
          const linked = modifiers.get(entity);
          drafts.push({
            recordType: 'MedicationRequest',
            entity,
            localKey: requestKey,
            references: { patient: patientFor(entity), practitioner },
            modifiers: linked,
          });
          if (this.isAdministered(entity, normalized, sentences, sentenceOf)) {
            const device = this.nearestInSentence(entity, devices, sentenceOf);
            const deviceKey = device ? keyOf.get(device) : undefined;
            drafts.push({
              recordType: 'MedicationAdministration',
              entity,
              localKey: nextKey('administration'),
              references: {
                patient: patientFor(entity),
                practitioner,
                request: localRef(requestKey),
                device: deviceKey ? localRef(deviceKey) : undefined,
              },
              modifiers: linked,
            });
          }
          break;
        }
        case 'Device':
          drafts.push({
            recordType: 'Device',
            entity,
            localKey: keyOf.get(entity) ?? nextKey('device'),
            references: { patient: patientFor(entity) },
          });
          break;
        case 'LabTest':
          drafts.push({
            recordType: 'ServiceRequest',
            entity,
            localKey: nextKey('lab'),
            references: { patient: patientFor(entity), practitioner },
            category: 'laboratory',
          });
          break;
        case 'Procedure':
          drafts.push({
            recordType: 'ServiceRequest',
            entity,
            localKey: nextKey('procedure'),
            references: { patient: patientFor(entity), practitioner },
            category: 'procedure',
          });
          break;
        case 'Observation':
          drafts.push({
            recordType: 'Observation',
            entity,
            localKey: nextKey('observation'),
            references: { patient: patientFor(entity), practitioner },
            category: 'vital-signs',
          });
          break;
        case 'Dosage':
        case 'Route':
          // Modifiers only; linked above
          break;
      }
    }

    const knownLocalKeys: ReadonlySet<string> = new Set(drafts.map((d) => d.localKey));
    const records = drafts.map((draft): PlannedRecord => ({
      recordType: draft.recordType,
      entity: draft.entity,
      concept: this.mapper.mapConcept(draft.entity.kind, draft.entity.normalizedText),
      reduced: draft.reduced ?? false,
      context: {
        localKey: draft.localKey,
        requestId: input.requestId,
        references: draft.references,
        knownLocalKeys,
        category: draft.category,
        recordedAt: input.recordedAt,
        modifiers: draft.modifiers,
      },
    }));

    return { records, unlinkedModifiers: unlinked };
  }

  /**
   * Reference for records when the text names no patient: the caller's
   * concrete reference, or a planned anonymous patient.
   */
  private fallbackPatient(
    input: PlanInput,
    patients: readonly ExtractedEntity[],
    drafts: Draft[],
    nextKey: (prefix: string) => string,
  ): RecordRef | undefined {
    if (patients.length > 0) return undefined;
    if (input.patientReference) return concreteRef(input.patientReference);

    const needsPatient = input.entities.some((e) => e.kind !== 'Dosage' && e.kind !== 'Route');
    if (!needsPatient) return undefined;

    const localKey = nextKey('patient');
    drafts.push({ recordType: 'Patient', entity: ANONYMOUS_PATIENT, localKey, references: {}, reduced: true });
    return localRef(localKey);
  }

  private isAdministered(
    medication: ExtractedEntity,
    normalized: string,
    sentences: readonly SourceOffset[],
    sentenceOf: (target: Linkable) => number,
  ): boolean {
    const sentence = sentences[sentenceOf(medication)];
    if (!sentence) return false;
    return this.administrationCue.test(normalized.slice(sentence.start, sentence.end));
  }

  private nearestInSentence<T extends Linkable>(
    anchor: Linkable,
    candidates: readonly T[],
    sentenceOf: (target: Linkable) => number,
  ): T | undefined {
    const sentence = sentenceOf(anchor);
    let best: T | undefined;
    let bestGap = Infinity;
    for (const candidate of candidates) {
      if (sentenceOf(candidate) !== sentence) continue;
      const distance = gap(anchor.sourceOffset, candidate.sourceOffset);
      // Candidates are in text order, so on a tie the earlier one is kept
      if (distance < bestGap) {
        best = candidate;
        bestGap = distance;
      }
    }
    return best;
  }

  /**
   * Attach every dosage, route and frequency mention to the nearest
   * medication of its sentence. Each medication keeps the closest modifier
   * of each sort.
   */
  private linkModifiers(
    entities: readonly ExtractedEntity[],
    medications: readonly ExtractedEntity[],
    normalized: string,
    sentenceOf: (target: Linkable) => number,
  ): { modifiers: Map<ExtractedEntity, DosageModifiers>; unlinked: ExtractedEntity[] } {
    const slotsByMedication = new Map<ExtractedEntity, ModifierSlots>();
    const unlinked: ExtractedEntity[] = [];

    const target = (modifier: Linkable) => {
      const medication = this.nearestInSentence(modifier, medications, sentenceOf);
      if (!medication) return undefined;
      const slots = slotsByMedication.get(medication) ?? {};
      slotsByMedication.set(medication, slots);
      return { slots, gap: gap(medication.sourceOffset, modifier.sourceOffset) };
    };

    for (const entity of entities) {
      if (entity.kind !== 'Dosage' && entity.kind !== 'Route') continue;
      const found = target(entity);
      if (!found) {
        unlinked.push(entity);
      } else if (entity.kind === 'Dosage') {
        found.slots.dosage = closer(found.slots.dosage, { gap: found.gap, value: entity });
      } else {
        found.slots.route = closer(found.slots.route, { gap: found.gap, value: entity });
      }
    }

    for (const mention of findFrequencies(normalized)) {
      const found = target(mention);
      if (!found) continue;
      const value: FrequencyModifier = { text: mention.text, repeat: mention.repeat, asNeeded: mention.asNeeded };
      found.slots.frequency = closer(found.slots.frequency, { gap: found.gap, value });
    }

    const modifiers = new Map<ExtractedEntity, DosageModifiers>();
    for (const [medication, slots] of slotsByMedication) {
      const route = slots.route?.value;
      modifiers.set(medication, {
        dosage: slots.dosage?.value,
        route,
        routeConcept: route ? this.mapper.mapConcept('Route', route.normalizedText) : undefined,
        frequency: slots.frequency?.value,
      });
    }
    return { modifiers, unlinked };
  }
}
