export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { isJsonObject } from './json.js';
export type { SchemaRecord, LogRecord } from './records.js';
export type { DomainEvent, LogCreatedEvent, LogDeletedEvent } from './events.js';
export {
  AppError,
  NotFoundError,
  ValidationError,
  BadRequestError,
  ConflictError,
  SchemaValidationError,
  DatabaseError,
  InternalError,
} from './errors.js';
export type { ErrorKind, FieldErrors } from './errors.js';
