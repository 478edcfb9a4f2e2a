import type fhir4 from 'fhir/r4';
import type { CodedConcept } from '../types/fhir-mapping.js';

const RELATIVE_REFERENCE_RE = /^[A-Z][A-Za-z]{1,63}\/[A-Za-z0-9\-.]{1,64}$/;
const ABSOLUTE_REFERENCE_RE = /^https?:\/\/[^\s/]+(?:\/[^\s]*)?\/[A-Z][A-Za-z]{1,63}\/[A-Za-z0-9\-.]{1,64}$/;

/**
 * True for a reference that already names a persisted resource:
 * `Patient/123` or `https://fhir.example.org/r4/Patient/123`.
 */
export function isConcreteReference(value: string): boolean {
  return RELATIVE_REFERENCE_RE.test(value) || ABSOLUTE_REFERENCE_RE.test(value);
}

export function anchorReference(internalId: string): `urn:uuid:${string}` {
  return `urn:uuid:${internalId}`;
}

export function fallbackConcept(text: string): CodedConcept {
  return { system: '', code: '', display: '', text };
}

export function isFallbackConcept(concept: CodedConcept): boolean {
  return concept.code === '';
}

/**
 * Convert a coded concept to a FHIR CodeableConcept. A fallback concept
 * carries only its text, never an empty or synthetic coding.
 */
export function toCodeableConcept(concept: CodedConcept, text?: string): fhir4.CodeableConcept {
  const conceptText = text ?? concept.text;
  if (isFallbackConcept(concept)) {
    return { text: conceptText };
  }
  return {
    coding: [
      {
        system: concept.system,
        code: concept.code,
        display: concept.display,
      },
    ],
    text: conceptText,
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Build a generated XHTML narrative from a plain-text summary.
 */
export function generatedNarrative(summary: string): fhir4.Narrative {
  return {
    status: 'generated',
    div: `<div xmlns="http://www.w3.org/1999/xhtml">${escapeHtml(summary)}</div>`,
  };
}
