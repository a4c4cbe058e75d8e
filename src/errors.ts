/**
 * Error taxonomy for the integration pipeline and the Q&A service
 */

export type ErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_SOURCE'
  | 'DATA_UNAVAILABLE'
  | 'BACKEND_NOT_CONFIGURED'
  | 'BACKEND_FAILURE'
  | 'INVALID_REQUEST';

export class ServiceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A required source file does not exist. Fatal to the pipeline.
 */
export class SourceUnavailableError extends ServiceError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `Data file not found: ${path}`, options);
  }
}

/**
 * The source exists but cannot be used as a table at all (no header, missing key column).
 */
export class MalformedSourceError extends ServiceError {
  constructor(readonly path: string, reason: string) {
    super('MALFORMED_SOURCE', `Malformed data source ${path}: ${reason}`);
  }
}

export class DataUnavailableError extends ServiceError {
  constructor(reason?: string) {
    super(
      'DATA_UNAVAILABLE',
      reason
        ? `Data is not loaded: ${reason}`
        : 'Data is not loaded. Please check server logs for file path errors.'
    );
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super('BACKEND_NOT_CONFIGURED', message);
  }
}

export class InvalidRequestError extends ServiceError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}

/**
 * Transport or server failure of the model backend. `status` is the HTTP status when there was one.
 */
export class BackendTransportError extends ServiceError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super('BACKEND_FAILURE', message, options);
  }
}

export class BackendUnexpectedResponseError extends ServiceError {
  constructor(message: string) {
    super('BACKEND_FAILURE', message);
  }
}

export class BackendUnavailableError extends ServiceError {
  constructor(attempts: number, lastError: unknown) {
    super(
      'BACKEND_FAILURE',
      `Could not reach the model backend after ${attempts} attempts. ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
