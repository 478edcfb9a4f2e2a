import { z } from 'zod';
import { isConcreteReference } from '../utils/fhir-helpers.js';

export const MAX_NOTE_LENGTH = 20_000;

const ConcreteReferenceSchema = z
  .string()
  .refine(isConcreteReference, {
    message: 'Expected a FHIR reference such as "Patient/123" or an absolute URL',
  });

export const ConversionRequestSchema = z.object({
  text: z.string().min(1).max(MAX_NOTE_LENGTH),
  requestId: z.string().min(1).max(128).optional(),
  patientReference: ConcreteReferenceSchema.optional(),
  practitionerReference: ConcreteReferenceSchema.optional(),
});

export const BatchConversionRequestSchema = z.object({
  items: z.array(ConversionRequestSchema).min(1).max(50),
});

export type ConversionRequest = z.infer<typeof ConversionRequestSchema>;
export type BatchConversionRequest = z.infer<typeof BatchConversionRequestSchema>;
