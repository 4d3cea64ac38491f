/**
 * Pipeline error taxonomy.
 *
 * Every error that crosses a use-case boundary is a `PipelineError` carrying a
 * stable `code` and whether the failure policy may retry it.
 */
export enum PipelineErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
  POOL_EXHAUSTED = 'POOL_EXHAUSTED',
  TRANSFORM_FAILED = 'TRANSFORM_FAILED',
  TRANSFORM_TIMEOUT = 'TRANSFORM_TIMEOUT',
  COLLABORATOR_UNAVAILABLE = 'COLLABORATOR_UNAVAILABLE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  MAX_RETRIES_EXCEEDED = 'MAX_RETRIES_EXCEEDED',
  ENGINE_INIT_FAILED = 'ENGINE_INIT_FAILED',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  JOB_ALREADY_EXISTS = 'JOB_ALREADY_EXISTS',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_NOT_COMPLETED = 'JOB_NOT_COMPLETED',
}

export interface PipelineErrorShape {
  code: PipelineErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(opts: PipelineErrorShape) {
    super(opts.message, { cause: opts.cause });
    this.name = new.target.name;
    this.code = opts.code;
    this.retryable = opts.retryable;
    this.details = opts.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/** Caller error, rejected before any side effect. */
export class InvalidInputError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PipelineErrorCode.INVALID_INPUT, message, retryable: false, details });
  }
}

/** A work message body that cannot be parsed into a job. */
export class MalformedMessageError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PipelineErrorCode.MALFORMED_MESSAGE, message, retryable: false, details });
  }
}

export class PoolExhaustedError extends PipelineError {
  constructor(timeoutMs: number, poolSize: number) {
    super({
      code: PipelineErrorCode.POOL_EXHAUSTED,
      message: `No transform engine became available within ${timeoutMs}ms (pool size ${poolSize})`,
      retryable: true,
      details: { timeoutMs, poolSize },
    });
  }
}

export class TransformError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super({ code: PipelineErrorCode.TRANSFORM_FAILED, message, retryable: true, cause });
  }
}

export class TransformTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super({
      code: PipelineErrorCode.TRANSFORM_TIMEOUT,
      message: `Transform exceeded ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
  }
}

export class CollaboratorUnavailableError extends PipelineError {
  constructor(collaborator: string, operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super({
      code: PipelineErrorCode.COLLABORATOR_UNAVAILABLE,
      message: `${collaborator} ${operation} failed: ${reason}`,
      retryable: true,
      details: { collaborator, operation },
      cause,
    });
  }
}

/** Fatal at startup. */
export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super({ code: PipelineErrorCode.CONFIGURATION_ERROR, message, retryable: false });
  }
}

export class MaxRetriesExceededError extends PipelineError {
  constructor(deliveryCount: number, maxRetries: number, lastError: PipelineError) {
    super({
      code: PipelineErrorCode.MAX_RETRIES_EXCEEDED,
      message: `Gave up after ${deliveryCount + 1} attempts (max retries ${maxRetries}): ${lastError.message}`,
      retryable: false,
      details: { deliveryCount, maxRetries, lastErrorCode: lastError.code },
      cause: lastError,
    });
  }
}

export class EngineInitializationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super({ code: PipelineErrorCode.ENGINE_INIT_FAILED, message, retryable: false, cause });
  }
}

export class InvalidStatusTransitionError extends PipelineError {
  constructor(jobId: string, from: string | null, to: string) {
    super({
      code: PipelineErrorCode.INVALID_STATUS_TRANSITION,
      message: `Job ${jobId} cannot move from ${from ?? 'absent'} to ${to}`,
      retryable: false,
      details: { jobId, from, to },
    });
  }
}

export class JobAlreadyExistsError extends PipelineError {
  constructor(jobId: string) {
    super({
      code: PipelineErrorCode.JOB_ALREADY_EXISTS,
      message: `Job ${jobId} already exists`,
      retryable: false,
      details: { jobId },
    });
  }
}

export class JobNotFoundError extends PipelineError {
  constructor(jobId: string) {
    super({
      code: PipelineErrorCode.JOB_NOT_FOUND,
      message: `Job ${jobId} not found`,
      retryable: false,
      details: { jobId },
    });
  }
}

export class JobNotCompletedError extends PipelineError {
  constructor(jobId: string, status: string) {
    super({
      code: PipelineErrorCode.JOB_NOT_COMPLETED,
      message: `Job ${jobId} is not completed (status: ${status})`,
      retryable: false,
      details: { jobId, status },
    });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Normalise anything thrown by a collaborator. Unknown errors are treated as
 * a retryable collaborator failure.
 */
export function toPipelineError(error: unknown, collaborator = 'unknown'): PipelineError {
  if (isPipelineError(error)) return error;
  return new CollaboratorUnavailableError(collaborator, 'call', error);
}

/** `CODE: message`, as stored in `errorDetail` and poison records. */
export function describeError(error: PipelineError): string {
  return `${error.code}: ${error.message}`;
}
