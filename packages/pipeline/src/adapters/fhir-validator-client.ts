import { fetch, type Response } from 'undici';
import { OperationOutcomeSchema } from '@notefhir/shared';
import type { FhirTransactionBundle, OperationOutcome } from '@notefhir/shared';
import { config } from '../config.js';

export type RemoteValidationResult =
  | { status: 'completed'; outcome: OperationOutcome }
  | { status: 'unavailable'; reason: string };

/** Anything that can run `$validate` on a rendered bundle. */
export interface RemoteValidator {
  validate(bundle: FhirTransactionBundle): Promise<RemoteValidationResult>;
}

export interface FhirValidatorClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Client for a FHIR server's `$validate` operation. Transport failures,
 * non-2xx answers and bodies that are not an OperationOutcome come back as
 * `unavailable`; there are no retries.
 */
export class FhirValidatorClient implements RemoteValidator {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: FhirValidatorClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.validator.url).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? config.validator.timeout;
  }

  async validate(bundle: FhirTransactionBundle): Promise<RemoteValidationResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/$validate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/fhir+json', Accept: 'application/fhir+json' },
        body: JSON.stringify(bundle),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        return { status: 'unavailable', reason: `FHIR validator timed out after ${this.timeoutMs}ms` };
      }
      return {
        status: 'unavailable',
        reason: `FHIR validator unreachable: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!response.ok) {
      return {
        status: 'unavailable',
        reason: `FHIR validator error: ${response.status} ${response.statusText}`,
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { status: 'unavailable', reason: 'FHIR validator returned a body that is not JSON' };
    }

    const parsed = OperationOutcomeSchema.safeParse(body);
    if (!parsed.success) {
      return { status: 'unavailable', reason: 'FHIR validator returned something other than an OperationOutcome' };
    }
    return { status: 'completed', outcome: parsed.data };
  }
}
