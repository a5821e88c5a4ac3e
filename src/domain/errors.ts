import type { ErrorCode } from './types.js';

export class DomainError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 422);
  }
}

export class StateConflictError extends DomainError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

export class AuthorizationError extends DomainError {
  constructor(message: string) {
    super('FORBIDDEN', message, 403);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/** Transaction or connection failure. Its message is safe to show; the cause is not. */
export class StorageError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 422,
  FORBIDDEN: 403,
  CONFLICT: 409,
  NOT_FOUND: 404,
  STORAGE_ERROR: 500
};

export function isRecoverable(error: unknown): error is DomainError {
  return error instanceof DomainError && !(error instanceof StorageError);
}
