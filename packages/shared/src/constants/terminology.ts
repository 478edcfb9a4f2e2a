export const CODE_SYSTEMS = {
  RXNORM: 'http://www.nlm.nih.gov/research/umls/rxnorm',
  SNOMED: 'http://snomed.info/sct',
  LOINC: 'http://loinc.org',
  UCUM: 'http://unitsofmeasure.org',
  OBSERVATION_CATEGORY: 'http://terminology.hl7.org/CodeSystem/observation-category',
  PROVENANCE_PARTICIPANT: 'http://terminology.hl7.org/CodeSystem/provenance-participant-type',
  PIPELINE_TAGS: 'urn:notefhir:pipeline',
} as const;

export const SNOMED_CATEGORY_CODES = {
  LABORATORY_PROCEDURE: '108252007', // Laboratory procedure
  DIAGNOSTIC_PROCEDURE: '103693007', // Diagnostic procedure
} as const;

/** Codes that stand in for "no match" and must never appear in a coding. */
export const PLACEHOLDER_CODE_PATTERN = /^(?:unknown|unk|n\/a|none|null|tbd)(?:[-_].*)?$/i;
