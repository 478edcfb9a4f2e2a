/**
 * Error taxonomy of the conversion pipeline.
 *
 * Only assembly failures and registry misconfiguration are ever thrown.
 * Builder structural problems travel inside a BuildResult and are recovered
 * by the reduced builder; terminology misses are a fallback concept.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly retryable: boolean;

  constructor(params: { code: string; message: string; statusCode: number; retryable?: boolean }) {
    super(params.message);
    this.name = 'PipelineError';
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.retryable = params.retryable ?? false;

    Object.setPrototypeOf(this, PipelineError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

export class AssemblyError extends PipelineError {
  constructor(code: string, message: string) {
    super({ code, message, statusCode: 422, retryable: false });
    this.name = 'AssemblyError';
    Object.setPrototypeOf(this, AssemblyError.prototype);
  }
}

export class DependencyCycleError extends AssemblyError {
  /** Local keys along the cycle; the first key is repeated at the end. */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super('DEPENDENCY_CYCLE', `Dependency cycle between records: ${cycle.join(' -> ')}`);
    this.name = 'DependencyCycleError';
    this.cycle = cycle;
    Object.setPrototypeOf(this, DependencyCycleError.prototype);
  }
}

export class DanglingReferenceError extends AssemblyError {
  readonly localKey: string;
  readonly path: string;
  readonly missingKey: string;

  constructor(localKey: string, path: string, missingKey: string) {
    super(
      'DANGLING_REFERENCE',
      `Record "${localKey}" references unknown local key "${missingKey}" at ${path}`,
    );
    this.name = 'DanglingReferenceError';
    this.localKey = localKey;
    this.path = path;
    this.missingKey = missingKey;
    Object.setPrototypeOf(this, DanglingReferenceError.prototype);
  }
}

export class DuplicateLocalKeyError extends AssemblyError {
  readonly localKey: string;

  constructor(localKey: string) {
    super('DUPLICATE_LOCAL_KEY', `Local key "${localKey}" is used by more than one record`);
    this.name = 'DuplicateLocalKeyError';
    this.localKey = localKey;
    Object.setPrototypeOf(this, DuplicateLocalKeyError.prototype);
  }
}

export class RegistryConfigurationError extends PipelineError {
  readonly recordType: string;

  constructor(recordType: string, message = `No builder registered for record type "${recordType}"`) {
    super({ code: 'REGISTRY_CONFIGURATION', message, statusCode: 500 });
    this.name = 'RegistryConfigurationError';
    this.recordType = recordType;
    Object.setPrototypeOf(this, RegistryConfigurationError.prototype);
  }
}

/** Returned, never thrown: a reference that is neither a concrete id nor a known local key. */
export class BuilderStructuralError extends PipelineError {
  readonly recordType: string;
  readonly path: string;

  constructor(recordType: string, path: string, detail: string) {
    super({
      code: 'BUILDER_STRUCTURAL',
      message: `${recordType}.${path}: ${detail}`,
      statusCode: 422,
    });
    this.name = 'BuilderStructuralError';
    this.recordType = recordType;
    this.path = path;
    Object.setPrototypeOf(this, BuilderStructuralError.prototype);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
