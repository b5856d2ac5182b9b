/**
 * Errors surfaced to HTTP clients carry their status code; storage errors are
 * translated by the service layer before they reach a controller.
 */

export interface FieldIssue {
  path: string;
  message: string;
  code: string;
}

export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'HttpError';
    this.status = status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get detail(): string {
    return this.message;
  }
}

/** Duplicate post id. Reported as 400. */
export class ConflictError extends HttpError {
  constructor(detail: string) {
    super(400, detail);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends HttpError {
  constructor(detail: string) {
    super(404, detail);
    this.name = 'NotFoundError';
  }
}

export class RequestValidationError extends HttpError {
  public readonly errors: FieldIssue[];

  constructor(errors: FieldIssue[]) {
    super(422, 'Validation failed');
    this.name = 'RequestValidationError';
    this.errors = errors;
  }
}

/** Unique constraint violation raised by the storage layer. */
export class DuplicateKeyError extends Error {
  constructor(key: string) {
    super(`Duplicate key: ${key}`);
    this.name = 'DuplicateKeyError';
  }
}

export class DatabaseError extends Error {
  constructor(cause: string) {
    super('Database error: ' + cause);
    this.name = 'DatabaseError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorStack = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined;

export const INTERNAL_ERROR_DETAIL = 'Internal server error';

/** Body of every 500; the stack is only exposed when NODE_ENV=development. */
export const internalErrorBody = (error: unknown, correlationId?: string) => ({
  detail: INTERNAL_ERROR_DETAIL,
  correlationId,
  ...(process.env.NODE_ENV === 'development' && { stack: errorStack(error) }),
});
