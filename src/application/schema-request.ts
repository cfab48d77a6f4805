import { z } from 'zod';
import { isJsonObject } from '../domain/index.js';
import type { JsonObject } from '../domain/index.js';

/**
 * Zod schemas for schema and log request bodies.
 *
 * Shape checks only: emptiness of name/version and conformance of the
 * definition are business rules enforced by the registry, so that the same
 * error kinds come back whichever adapter calls it.
 */

const NIL_UUID = '00000000-0000-0000-0000-000000000000';

const jsonObject = z.custom<JsonObject>(isJsonObject, { message: 'Log data must be a JSON object' });

/** Body of POST /schemas and PUT /schemas/:id. */
export const schemaBodySchema = z.object({
  name: z.string().max(255),
  version: z.string().max(50),
  description: z.string().nullish(),
  schema_definition: z.unknown(),
});

export type SchemaBody = z.infer<typeof schemaBodySchema>;

/** Body of POST /logs. */
export const createLogBodySchema = z.object({
  schema_id: z
    .string()
    .uuid({ message: 'schema_id must be a valid UUID' })
    .refine((id) => id !== NIL_UUID, { message: 'Schema ID cannot be empty' }),
  log_data: jsonObject,
});

export type CreateLogBody = z.infer<typeof createLogBodySchema>;

/** Query of GET /schemas. */
export const listSchemasQuerySchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

/** Query of DELETE /schemas/:id. */
export const deleteSchemaQuerySchema = z.object({
  force: z.enum(['true', 'false']).optional().transform((v) => v === 'true'),
});

/** Query of the live subscription endpoint. */
export const subscribeQuerySchema = z.object({
  schema_id: z.string().uuid({ message: 'schema_id must be a valid UUID' }).optional(),
});
