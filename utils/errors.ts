export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'INVALID_STATE'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'PERSISTENCE_FAILURE';

/**
 * Base class for failures that carry their own HTTP mapping. Services throw
 * these; the error-handler middleware turns them into JSON responses.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT', 400);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STATE', 400);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(message, 'FORBIDDEN', 403);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_FAILURE', 500, { cause });
  }
}
