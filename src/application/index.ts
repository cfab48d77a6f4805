export type { SchemaStore, LogStore, SchemaListFilter, NewLog, StoreErrorReason } from './ports.js';
export { StoreError } from './ports.js';
export { translateStoreError, withStore } from './store-errors.js';
export type { StoreErrorMapping } from './store-errors.js';
export {
  ValidationEngine,
  SchemaCompileError,
  formatPathErrors,
  pathErrorsToFieldErrors,
} from './validation-engine.js';
export type { Validator, PathError } from './validation-engine.js';
export { SchemaRegistry } from './schema-registry.js';
export type { SchemaInput, SchemaRegistryDeps } from './schema-registry.js';
export { translateQueryFilter } from './query-filter.js';
export type { QueryParams } from './query-filter.js';
export { LogIngestionService } from './log-ingestion.js';
export type { EventPublisher, LogIngestionDeps } from './log-ingestion.js';
export { EventBroadcaster, Subscription, DEFAULT_SUBSCRIPTION_CAPACITY } from './event-broadcaster.js';
export type { SubscribeOptions } from './event-broadcaster.js';
export {
  schemaBodySchema,
  createLogBodySchema,
  listSchemasQuerySchema,
  deleteSchemaQuerySchema,
  subscribeQuerySchema,
} from './schema-request.js';
export type { SchemaBody, CreateLogBody } from './schema-request.js';
