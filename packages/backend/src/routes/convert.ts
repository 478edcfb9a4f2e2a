import type { FastifyInstance } from 'fastify';
import { BatchConversionRequestSchema, ConversionRequestSchema, MAX_NOTE_LENGTH } from '@notefhir/shared';
import type { BatchItemResult, ClinicalNotePipeline } from '@notefhir/pipeline';
import { formatZodIssues } from '../http-errors.js';

export interface ConvertRoutesOptions {
  pipeline: ClinicalNotePipeline;
}

const conversionBodySchema = {
  type: 'object' as const,
  required: ['text'],
  properties: {
    text: { type: 'string', minLength: 1, maxLength: MAX_NOTE_LENGTH },
    requestId: { type: 'string' },
    patientReference: { type: 'string', description: 'e.g. Patient/123' },
    practitionerReference: { type: 'string', description: 'e.g. Practitioner/7' },
  },
};

const conversionResultSchema = {
  type: 'object' as const,
  additionalProperties: true,
  properties: {
    bundle: { type: 'object', additionalProperties: true },
    report: { type: 'object', additionalProperties: true },
    summary: { type: 'object', additionalProperties: true },
  },
};

const ExtractRequestSchema = ConversionRequestSchema.pick({ text: true });

function serializeBatchItem(item: BatchItemResult): Record<string, unknown> {
  if (item.status === 'rejected') {
    return { status: item.status, requestId: item.requestId, error: item.error };
  }
  const { bundle, report, summary } = item.result;
  return { status: item.status, requestId: item.requestId, bundle, report, summary };
}

export default async function convertRoutes(app: FastifyInstance, options: ConvertRoutesOptions) {
  const { pipeline } = options;

  // POST /api/convert: one clinical note to a transaction bundle
  app.post(
    '/api/convert',
    {
      schema: {
        tags: ['Conversion'],
        summary: 'Convert a clinical note',
        description: 'Extracts clinical entities and returns a validated FHIR R4 transaction Bundle.',
        body: conversionBodySchema,
        response: {
          200: { description: 'Bundle, validation report and summary', ...conversionResultSchema },
        },
      },
    },
    async (request, reply) => {
      const parsed = ConversionRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation error', details: formatZodIssues(parsed.error.issues) });
      }
      const input = { ...parsed.data, requestId: parsed.data.requestId ?? request.id };
      const { bundle, report, summary } = await pipeline.convert(input);
      return reply.send({ bundle, report, summary });
    },
  );

  // POST /api/convert/batch: independent notes, one result each
  app.post(
    '/api/convert/batch',
    {
      schema: {
        tags: ['Conversion'],
        summary: 'Convert several clinical notes',
        body: {
          type: 'object',
          required: ['items'],
          properties: {
            items: { type: 'array', minItems: 1, maxItems: 50, items: conversionBodySchema },
          },
        },
      },
    },
    async (request, reply) => {
      const parsed = BatchConversionRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation error', details: formatZodIssues(parsed.error.issues) });
      }
      const items = parsed.data.items.map((item, i) => ({ ...item, requestId: item.requestId ?? `${request.id}-${i}` }));
      const results = await pipeline.convertBatch(items);
      return reply.send({ results: results.map(serializeBatchItem) });
    },
  );

  // POST /api/extract: entities only, no bundle
  app.post(
    '/api/extract',
    {
      schema: {
        tags: ['Conversion'],
        summary: 'Extract entities from a clinical note',
        body: {
          type: 'object',
          required: ['text'],
          properties: { text: { type: 'string', minLength: 1, maxLength: MAX_NOTE_LENGTH } },
        },
      },
    },
    async (request, reply) => {
      const parsed = ExtractRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation error', details: formatZodIssues(parsed.error.issues) });
      }
      return reply.send({ entities: pipeline.extract(parsed.data.text) });
    },
  );
}
