export type PermissionsErrorCode =
  | 'VALIDATION'
  | 'REMOTE_API'
  | 'RESOLUTION'
  | 'CLASSIFICATION'
  | 'CANCELLED';

export class PermissionsError extends Error {
  readonly code: PermissionsErrorCode;

  constructor(code: PermissionsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermissionsError';
    this.code = code;
  }
}

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Raised before any network call when the declared configuration is unusable.
 */
export class ValidationError extends PermissionsError {
  readonly fieldErrors: FieldError[];

  constructor(fieldErrors: FieldError[], message = formatFieldErrors(fieldErrors)) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }
}

function formatFieldErrors(fieldErrors: FieldError[]): string {
  const details = fieldErrors.map(e => `[${e.field}] ${e.message}`).join(' ');
  return `invalid config supplied. ${details}`;
}

/**
 * Non-2xx response from the workspace. Status, error code and message are
 * kept exactly as the server sent them.
 */
export class ApiError extends PermissionsError {
  readonly statusCode: number;
  readonly errorCode: string;

  constructor(statusCode: number, errorCode: string, message: string) {
    super('REMOTE_API', message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, errorCode = 'NOT_FOUND') {
    super(404, errorCode, message);
    this.name = 'NotFoundError';
  }
}

export class ResolutionError extends PermissionsError {
  readonly target: string;

  constructor(message: string, target: string, cause?: unknown) {
    super('RESOLUTION', message, { cause });
    this.name = 'ResolutionError';
    this.target = target;
  }
}

export class ClassificationError extends PermissionsError {
  readonly objectType: string;

  constructor(objectType: string) {
    super('CLASSIFICATION', `unknown object type ${objectType}`);
    this.name = 'ClassificationError';
    this.objectType = objectType;
  }
}

export class CancelledError extends PermissionsError {
  constructor(step: string) {
    super('CANCELLED', `operation cancelled before ${step}`);
    this.name = 'CancelledError';
  }
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof ApiError && error.statusCode === 404;
}

export function throwIfAborted(signal: AbortSignal | undefined, step: string): void {
  if (signal?.aborted) {
    throw new CancelledError(step);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
