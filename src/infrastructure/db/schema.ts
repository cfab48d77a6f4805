import { pgTable, varchar, text, serial, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { JsonObject } from '../../domain/index.js';

/**
 * Drizzle schema for the `schemas` table.
 *
 * `id` is a UUID string generated by the registry. The unique index on
 * (name, version) is the authoritative duplicate guard; the registry's
 * pre-check only gives a friendlier message.
 */
export const schemas = pgTable('schemas', {
  id: varchar('id', { length: 255 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  version: varchar('version', { length: 50 }).notNull(),
  description: text('description'),
  schema_definition: jsonb('schema_definition').$type<JsonObject>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_schemas_name_version').on(table.name, table.version),
  index('idx_schemas_name').on(table.name),
]);

/**
 * Drizzle schema for the `logs` table.
 *
 * `schema_id` is a real foreign key: a log cannot outlive its schema, which
 * is why forced schema deletion removes logs first.
 * The GIN index serves `log_data @> filter` containment queries.
 */
export const logs = pgTable('logs', {
  id: serial('id').primaryKey(),
  schema_id: varchar('schema_id', { length: 255 }).notNull().references(() => schemas.id),
  log_data: jsonb('log_data').$type<JsonObject>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_logs_schema_id').on(table.schema_id),
  index('idx_logs_created_at').on(table.created_at),
  index('idx_logs_data_gin').using('gin', table.log_data),
]);
