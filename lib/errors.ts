export type FailureKind = "transient" | "permanent";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MissingLockError extends ConfigurationError {
  projectId: string;

  constructor(projectId: string, message = `No approved locked style for project "${projectId}"`) {
    super(message);
    this.name = "MissingLockError";
    this.projectId = projectId;
  }
}

export class StyleAlreadyLockedError extends ConfigurationError {
  projectId: string;
  lockedConfigRef: string;

  constructor(projectId: string, lockedConfigRef: string, message?: string) {
    super(message ?? `Project "${projectId}" is already locked to ${lockedConfigRef}; relock explicitly to change it`);
    this.name = "StyleAlreadyLockedError";
    this.projectId = projectId;
    this.lockedConfigRef = lockedConfigRef;
  }
}

export class InvalidParameterError extends ConfigurationError {
  field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "InvalidParameterError";
    this.field = field;
  }
}

type GenerationServiceErrorOptions = {
  statusCode?: number;
  responseBody?: string;
  retryAfterSeconds?: number;
  cause?: unknown;
};

export class GenerationServiceError extends Error {
  failureKind: FailureKind;
  statusCode?: number;
  responseBody?: string;
  retryAfterSeconds?: number;

  constructor(message: string, failureKind: FailureKind, options?: GenerationServiceErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GenerationServiceError";
    this.failureKind = failureKind;
    this.statusCode = options?.statusCode;
    this.responseBody = options?.responseBody;
    this.retryAfterSeconds = options?.retryAfterSeconds;
  }
}

export class ServiceUnavailableError extends GenerationServiceError {
  constructor(message: string, options?: GenerationServiceErrorOptions) {
    super(message, "transient", options);
    this.name = "ServiceUnavailableError";
  }
}

export class RateLimitError extends GenerationServiceError {
  constructor(message: string, options?: GenerationServiceErrorOptions) {
    super(message, "transient", { statusCode: 429, ...options });
    this.name = "RateLimitError";
  }
}

export class InvalidRequestError extends GenerationServiceError {
  constructor(message: string, options?: GenerationServiceErrorOptions) {
    super(message, "permanent", options);
    this.name = "InvalidRequestError";
  }
}

export class ArtifactNotReadyError extends GenerationServiceError {
  constructor(message: string, options?: GenerationServiceErrorOptions) {
    super(message, "transient", options);
    this.name = "ArtifactNotReadyError";
  }
}

export class DownloadFailedError extends GenerationServiceError {
  constructor(message: string, options?: GenerationServiceErrorOptions) {
    super(message, "transient", options);
    this.name = "DownloadFailedError";
  }
}

export class AttemptTimeoutError extends GenerationServiceError {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Generation attempt timed out after ${timeoutMs}ms`, "transient", { statusCode: 504 });
    this.name = "AttemptTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class BatchNotFoundError extends Error {
  batchId: string;

  constructor(batchId: string) {
    super(`Batch "${batchId}" not found`);
    this.name = "BatchNotFoundError";
    this.batchId = batchId;
  }
}

export class ScoringUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ScoringUnavailableError";
  }
}

/** Unknown adapter errors are retried: only the adapter can declare a failure permanent. */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof GenerationServiceError) return error.failureKind;
  return "transient";
}

export function isThrottleError(error: unknown): error is RateLimitError | ServiceUnavailableError {
  return error instanceof RateLimitError || error instanceof ServiceUnavailableError;
}

export function toErrorMessage(error: unknown, fallback: string) {
  if (error instanceof Error && error.message.trim()) return error.message;
  return fallback;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function httpStatusForError(error: unknown): number {
  if (error instanceof InvalidParameterError) return 400;
  if (error instanceof MissingLockError || error instanceof BatchNotFoundError) return 404;
  if (error instanceof StyleAlreadyLockedError) return 409;
  if (error instanceof GenerationServiceError && error.statusCode) return error.statusCode;
  return 500;
}
