export { default as errorHandler } from './error-handler.js';
export { default as healthRoutes } from './health-routes.js';
export { default as schemaRoutes } from './schema-routes.js';
export { default as logRoutes } from './log-routes.js';
export { toAppError, toErrorBody, zodFieldErrors, requestValidationError } from './errors.js';
export type { ErrorBody } from './errors.js';
export { serializeSchema, serializeLog } from './serializers.js';
export type { SchemaResponse, LogResponse } from './serializers.js';
