import type { ZodError } from 'zod';
import {
  AppError,
  BadRequestError,
  InternalError,
  ValidationError,
} from '../../domain/index.js';
import type { ErrorKind, FieldErrors } from '../../domain/index.js';

/** Wire shape of every error response. */
export interface ErrorBody {
  error: ErrorKind;
  message: string;
  field_errors?: FieldErrors;
}

const GENERIC_MESSAGES: Partial<Record<ErrorKind, string>> = {
  DatabaseError: 'A database error occurred',
  InternalError: 'An internal error occurred',
};

export function toErrorBody(error: AppError): ErrorBody {
  const message = error.exposeMessage
    ? error.message
    : GENERIC_MESSAGES[error.kind] ?? 'An internal error occurred';

  const body: ErrorBody = { error: error.kind, message };
  if (error.fieldErrors !== undefined && Object.keys(error.fieldErrors).length > 0) {
    body.field_errors = error.fieldErrors;
  }
  return body;
}

/**
 * Normalizes anything thrown inside a route. Fastify's own client errors
 * (unparseable JSON, wrong content type, oversized body) become BadRequest;
 * everything unrecognized is an internal error.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof Error && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
      return new BadRequestError(error.message);
    }
  }

  return new InternalError('An internal error occurred', error);
}

/** Groups zod issues by field. Issues on the value itself are keyed `_body`. */
export function zodFieldErrors(error: ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_body';
    (fieldErrors[key] ??= []).push(issue.message);
  }
  return fieldErrors;
}

/**
 * A failed request-shape check carrying field errors. Malformed input is a
 * ValidationError; a payload of the wrong shape for a resource reference
 * (log bodies) is a BadRequest.
 */
export function requestValidationError(
  error: ZodError,
  kind: 'ValidationError' | 'BadRequest' = 'ValidationError',
): AppError {
  const fieldErrors = zodFieldErrors(error);
  const message = Object.entries(fieldErrors)
    .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
    .join('; ');
  return kind === 'BadRequest'
    ? new BadRequestError(message, fieldErrors)
    : new ValidationError(message, fieldErrors);
}
