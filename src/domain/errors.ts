/**
 * Application error taxonomy.
 *
 * Every failure a caller can observe is one of these. `kind` is the stable
 * machine-readable name sent in error responses; `statusCode` is the HTTP
 * status the adapter uses.
 */

export type ErrorKind =
  | 'NotFound'
  | 'ValidationError'
  | 'BadRequest'
  | 'Conflict'
  | 'SchemaValidationError'
  | 'DatabaseError'
  | 'InternalError';

/** Per-field messages, e.g. `{ name: ['must not be empty'] }`. */
export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;
  readonly fieldErrors?: FieldErrors;

  constructor(
    kind: ErrorKind,
    statusCode: number,
    message: string,
    options?: { fieldErrors?: FieldErrors; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AppError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.fieldErrors = options?.fieldErrors;
  }

  /**
   * Whether the message may be shown to the caller.
   * Storage and internal failures are logged, not detailed.
   */
  get exposeMessage(): boolean {
    return this.statusCode < 500;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', 404, message);
    this.name = 'NotFoundError';
  }
}

/** Malformed or empty input fields. */
export class ValidationError extends AppError {
  constructor(message: string, fieldErrors?: FieldErrors) {
    super('ValidationError', 400, message, { fieldErrors });
    this.name = 'ValidationError';
  }
}

/** Malformed identifiers or wrong payload shape. */
export class BadRequestError extends AppError {
  constructor(message: string, fieldErrors?: FieldErrors) {
    super('BadRequest', 400, message, { fieldErrors });
    this.name = 'BadRequestError';
  }
}

/** Uniqueness or dependent-resource violations. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super('Conflict', 409, message);
    this.name = 'ConflictError';
  }
}

/** A schema definition, or an instance checked against one, breaks schema rules. */
export class SchemaValidationError extends AppError {
  constructor(message: string, fieldErrors?: FieldErrors) {
    super('SchemaValidationError', 422, message, { fieldErrors });
    this.name = 'SchemaValidationError';
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('DatabaseError', 500, message, { cause });
    this.name = 'DatabaseError';
  }
}

export class InternalError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('InternalError', 500, message, { cause });
    this.name = 'InternalError';
  }
}
