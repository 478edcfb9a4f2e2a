import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { createPipeline, type ClinicalNotePipeline } from '@notefhir/pipeline';

import { config } from './config.js';
import { toHttpError } from './http-errors.js';
import convertRoutes from './routes/convert.js';
import healthRoutes from './routes/health.js';

export interface AppOptions {
  /** Built from the environment with `app.log` when absent. */
  pipeline?: ClinicalNotePipeline;
}

async function appPlugin(app: FastifyInstance, options: AppOptions) {
  const pipeline = options.pipeline ?? createPipeline({ logger: app.log });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // JSON-only API
  });

  await app.register(cors, {
    origin: [...config.corsOrigins],
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Rate limiting (in-memory store)
  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  });

  // OpenAPI docs
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'notefhir API',
        description: 'Clinical note to FHIR R4 transaction Bundle conversion',
        version: '0.1.0',
      },
    },
  });
  await app.register(swaggerUi, { routePrefix: '/api/docs' });

  // Global error handler
  app.setErrorHandler((err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { statusCode, body } = toHttpError(err);
    if (statusCode >= 500) {
      request.log.error({ err }, 'Unhandled error');
    } else if (statusCode === 422) {
      request.log.warn({ code: body.code }, err.message);
    }
    return reply.status(statusCode).send(body);
  });

  app.setNotFoundHandler((_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  await app.register(healthRoutes, { pipeline });
  await app.register(convertRoutes, { pipeline });
}

export default appPlugin;

export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: config.logLevel },
    genReqId: () => randomUUID(),
    bodyLimit: config.bodyLimit,
  });

  await app.register(appPlugin, options);
  await app.ready();

  return app;
}
