export type FieldErrors = Record<string, string[]>;

/**
 * Base class for failures the HTTP layer translates into a response.
 * `status` is the HTTP status the error handler answers with.
 */
export abstract class BlogError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input shape or a uniqueness clash the user can correct. */
export class ValidationError extends BlogError {
  readonly status = 400;

  constructor(message: string, readonly details: FieldErrors = {}) {
    super(message);
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, { [field]: [message] });
  }
}

export class NotFoundError extends BlogError {
  readonly status = 404;
}

/** The operation would break a store invariant (e.g. deleting the default category). */
export class ConflictError extends BlogError {
  readonly status = 409;
}

export class AuthorizationError extends BlogError {
  readonly status: 401 | 403;

  constructor(message: string, status: 401 | 403 = 403) {
    super(message);
    this.status = status;
  }
}

interface PgErrorLike {
  code?: unknown;
  constraint?: unknown;
  cause?: unknown;
}

function isPgErrorLike(value: unknown): value is PgErrorLike {
  return typeof value === 'object' && value !== null;
}

/**
 * Detects a Postgres unique_violation (23505), optionally for one constraint.
 * The driver error may arrive wrapped in a `cause`.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && isPgErrorLike(current); depth++) {
    if (current.code === '23505') {
      return constraint === undefined || current.constraint === constraint;
    }
    current = current.cause;
  }
  return false;
}
