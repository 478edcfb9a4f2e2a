import type { FastifyError } from 'fastify';
import { isPipelineError } from '@notefhir/pipeline';
import type { ZodIssue } from 'zod';

export interface HttpErrorResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export function formatZodIssues(issues: readonly ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/** Maps anything a route throws to a status code and a JSON body. */
export function toHttpError(err: FastifyError | Error): HttpErrorResponse {
  if (isPipelineError(err)) {
    return { statusCode: err.statusCode, body: err.toJSON() };
  }
  if ('validation' in err && err.validation) {
    return { statusCode: 400, body: { error: 'Validation error', details: err.validation } };
  }
  if ('statusCode' in err && err.statusCode !== undefined && err.statusCode < 500) {
    return { statusCode: err.statusCode, body: { error: err.message } };
  }
  return { statusCode: 500, body: { error: 'Internal server error' } };
}
