import type { JsonObject } from './json.js';

/**
 * A registered, versioned data schema.
 *
 * `(name, version)` is unique across all stored schemas.
 * `schema_definition` is a Draft-07 JSON Schema document.
 */
export interface SchemaRecord {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly description: string | null;
  readonly schema_definition: JsonObject;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/**
 * A stored log entry. `id` is assigned by the store.
 *
 * Validated against its schema once, at creation; never mutated.
 */
export interface LogRecord {
  readonly id: number;
  readonly schema_id: string;
  readonly log_data: JsonObject;
  readonly created_at: Date;
}
