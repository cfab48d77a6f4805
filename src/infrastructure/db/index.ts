export { schemas, logs } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, Sql } from './client.js';
export { ensureTables } from './migrate.js';
export { toStoreError, guarded } from './pg-errors.js';
export {
  createSchemaStore,
  findSchemas,
  findSchemaById,
  findSchemaByNameVersion,
  insertSchema,
  updateSchema,
  deleteSchema,
} from './schema-repository.js';
export type { SchemaRow, SchemaUpdateFields } from './schema-repository.js';
export {
  createLogStore,
  findLogsBySchema,
  findLogById,
  insertLog,
  deleteLog,
  countLogsBySchema,
  deleteLogsBySchema,
} from './log-repository.js';
export type { LogRow } from './log-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { Stores, DbPluginOptions } from './db-plugin.js';
