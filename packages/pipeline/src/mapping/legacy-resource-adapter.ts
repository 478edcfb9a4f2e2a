import { randomUUID } from 'node:crypto';
import type {
  BuildContext,
  DosageModifiers,
  EntityKind,
  ExtractedEntity,
  FhirResourceBody,
  PipelineRecord,
} from '@notefhir/shared';
import { toBundleEntry } from '../assembly/bundle-assembler.js';
import { renderResource } from '../assembly/fhir-document.js';
import { findFrequencies } from '../extraction/frequency.js';
import { collapseWhitespace, normalizeForMatching } from '../extraction/normalize.js';
import type { FactoryRegistry } from '../factories/factory-registry.js';
import { concreteRef } from '../factories/references.js';
import type { TerminologyMapper } from '../terminology/terminology-mapper.js';

const NO_LOCAL_KEYS: ReadonlySet<string> = new Set();

export interface MedicationAdministrationParams {
  medicationName: string;
  patientId: string;
  practitionerId?: string;
  dosage?: string;
  route?: string;
  status?: string;
  effectiveDateTime?: string;
  medicationRequestId?: string;
  deviceId?: string;
}

export interface MedicationRequestParams {
  medicationName: string;
  patientId: string;
  practitionerId?: string;
  dosage?: string;
  route?: string;
  frequency?: string;
  status?: string;
  authoredOn?: string;
}

export interface ServiceRequestParams {
  serviceName: string;
  patientId: string;
  practitionerId?: string;
  category?: 'laboratory' | 'procedure';
  status?: string;
  authoredOn?: string;
}

export interface ObservationParams {
  name: string;
  value: string;
  patientId: string;
  practitionerId?: string;
  category?: 'vital-signs' | 'laboratory';
  status?: string;
  effectiveDateTime?: string;
}

export interface DeviceParams {
  deviceName: string;
  patientId: string;
}

export interface PatientParams {
  name: string;
}

/** `123` → `Patient/123`; an id that already names its type is kept. */
function qualify(resourceType: string, id: string): string {
  return id.includes('/') ? id : `${resourceType}/${id}`;
}

function syntheticEntity(kind: EntityKind, rawText: string, normalizedText?: string): ExtractedEntity {
  return {
    kind,
    rawText,
    normalizedText: normalizedText ?? collapseWhitespace(normalizeForMatching(rawText)),
    sourceOffset: { start: 0, end: rawText.length },
    confidence: 1,
    rule: 'legacy-adapter',
  };
}

/**
 * One-resource-at-a-time entry points for callers that already hold server
 * ids. Each call maps the term, builds the record through the registry with
 * concrete references and returns the resource body, ready to POST.
 */
export class LegacyResourceAdapter {
  constructor(
    private readonly mapper: TerminologyMapper,
    private readonly registry: FactoryRegistry,
  ) {}

  createMedicationAdministration(params: MedicationAdministrationParams): FhirResourceBody {
    const entity = syntheticEntity('Medication', params.medicationName);
    return this.create('MedicationAdministration', entity, {
      references: {
        patient: concreteRef(qualify('Patient', params.patientId)),
        practitioner: params.practitionerId ? concreteRef(qualify('Practitioner', params.practitionerId)) : undefined,
        request: params.medicationRequestId
          ? concreteRef(qualify('MedicationRequest', params.medicationRequestId))
          : undefined,
        device: params.deviceId ? concreteRef(qualify('Device', params.deviceId)) : undefined,
      },
      status: params.status,
      recordedAt: params.effectiveDateTime,
      modifiers: this.modifiers(params.dosage, params.route),
    });
  }

  createMedicationRequest(params: MedicationRequestParams): FhirResourceBody {
    const entity = syntheticEntity('Medication', params.medicationName);
    return this.create('MedicationRequest', entity, {
      references: {
        patient: concreteRef(qualify('Patient', params.patientId)),
        practitioner: params.practitionerId ? concreteRef(qualify('Practitioner', params.practitionerId)) : undefined,
      },
      status: params.status,
      recordedAt: params.authoredOn,
      modifiers: this.modifiers(params.dosage, params.route, params.frequency),
    });
  }

  createServiceRequest(params: ServiceRequestParams): FhirResourceBody {
    const category = params.category ?? 'laboratory';
    const entity = syntheticEntity(category === 'laboratory' ? 'LabTest' : 'Procedure', params.serviceName);
    return this.create('ServiceRequest', entity, {
      references: {
        patient: concreteRef(qualify('Patient', params.patientId)),
        practitioner: params.practitionerId ? concreteRef(qualify('Practitioner', params.practitionerId)) : undefined,
      },
      status: params.status,
      category,
      recordedAt: params.authoredOn,
    });
  }

  createObservation(params: ObservationParams): FhirResourceBody {
    const name = collapseWhitespace(normalizeForMatching(params.name));
    const entity = syntheticEntity('Observation', `${params.name} ${params.value}`, name);
    return this.create('Observation', entity, {
      references: {
        patient: concreteRef(qualify('Patient', params.patientId)),
        practitioner: params.practitionerId ? concreteRef(qualify('Practitioner', params.practitionerId)) : undefined,
      },
      status: params.status,
      category: params.category ?? 'vital-signs',
      recordedAt: params.effectiveDateTime,
    });
  }

  createDevice(params: DeviceParams): FhirResourceBody {
    return this.create('Device', syntheticEntity('Device', params.deviceName), {
      references: { patient: concreteRef(qualify('Patient', params.patientId)) },
    });
  }

  createPatient(params: PatientParams): FhirResourceBody {
    return this.create('Patient', syntheticEntity('Patient', params.name), { references: {} });
  }

  private modifiers(dosage?: string, route?: string, frequency?: string): DosageModifiers | undefined {
    if (!dosage && !route && !frequency) return undefined;
    const routeEntity = route ? syntheticEntity('Route', route) : undefined;
    const [schedule] = frequency ? findFrequencies(normalizeForMatching(frequency)) : [];
    return {
      dosage: dosage ? syntheticEntity('Dosage', dosage) : undefined,
      route: routeEntity,
      routeConcept: routeEntity ? this.mapper.mapConcept('Route', routeEntity.normalizedText) : undefined,
      frequency: frequency
        ? { text: frequency, repeat: schedule?.repeat, asNeeded: schedule?.asNeeded ?? false }
        : undefined,
    };
  }

  private create(
    recordType: string,
    entity: ExtractedEntity,
    context: Omit<BuildContext, 'localKey' | 'knownLocalKeys'>,
  ): FhirResourceBody {
    const localKey = `${recordType.toLowerCase()}-0`;
    const concept = this.mapper.mapConcept(entity.kind, entity.normalizedText);
    const { record } = this.registry.buildOrReduce(recordType, entity, concept, {
      ...context,
      localKey,
      knownLocalKeys: NO_LOCAL_KEYS,
    });
    return this.render(record);
  }

  private render(record: PipelineRecord): FhirResourceBody {
    return renderResource(toBundleEntry(record, randomUUID(), new Map()));
  }
}
