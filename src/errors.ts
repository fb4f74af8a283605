export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'SOURCE_UNAVAILABLE'
  | 'INDEX_UNAVAILABLE';

/**
 * Error surfaced to callers. Degraded failures (cache, index during ingest,
 * definition lookups) never become a ServiceError; they are logged instead.
 */
export class ServiceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceError';
    this.code = code;
  }
}

export function invalidArgument(message: string): ServiceError {
  return new ServiceError('INVALID_ARGUMENT', message);
}

export function isServiceError(value: unknown): value is ServiceError {
  return value instanceof ServiceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
