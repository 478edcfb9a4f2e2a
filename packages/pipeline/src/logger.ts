import { pino } from 'pino';
import type { BaseLogger } from 'pino';
import { config } from './config.js';

/** The slice of a pino logger the pipeline writes to. Fastify's `app.log` satisfies it. */
export type PipelineLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: string = config.logLevel): PipelineLogger {
  return pino({ name: 'notefhir-pipeline', level });
}

export const silentLogger: PipelineLogger = pino({ level: 'silent' });
