// src/lib/errors.ts

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_IDENTIFIER'
  | 'NOT_FOUND'
  | 'SERVICE_UNAVAILABLE';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(message: string, statusCode: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/**
 * Precondition fault: the caller sent something malformed. Never retried.
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, code: 'INVALID_ARGUMENT' | 'INVALID_IDENTIFIER' = 'INVALID_ARGUMENT') {
    super(message, 400, code);
  }
}

/**
 * A device identifier that does not match the hardware address pattern.
 */
export class InvalidIdentifierError extends InvalidArgumentError {
  constructor(message: string) {
    super(message, 'INVALID_IDENTIFIER');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * A store or lookup the service depends on is unreachable, timed out, or failed.
 * Callers own retry and backoff.
 */
export class InfrastructureError extends AppError {
  readonly dependency: string;

  constructor(dependency: string, message: string, cause?: unknown) {
    super(message, 503, 'SERVICE_UNAVAILABLE', { cause });
    this.dependency = dependency;
  }
}
