import type { FastifyInstance } from 'fastify';
import type { ClinicalNotePipeline } from '@notefhir/pipeline';

export interface HealthRoutesOptions {
  pipeline: ClinicalNotePipeline;
}

export default async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions) {
  // GET /api/health: liveness and whether remote $validate is configured
  app.get(
    '/api/health',
    {
      schema: {
        tags: ['Health'],
        summary: 'Health check',
        response: {
          200: {
            description: 'Health status',
            type: 'object',
            properties: {
              status: { type: 'string' },
              remoteValidation: { type: 'string', enum: ['enabled', 'disabled'] },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        remoteValidation: options.pipeline.remoteValidationEnabled ? 'enabled' : 'disabled',
      });
    },
  );
}
