import type { JsonObject, LogRecord, SchemaRecord } from '../../domain/index.js';

export interface SchemaResponse {
  id: string;
  name: string;
  version: string;
  description: string | null;
  schema_definition: JsonObject;
  created_at: string;
  updated_at: string;
}

export interface LogResponse {
  id: number;
  schema_id: string;
  log_data: JsonObject;
  created_at: string;
}

export function serializeSchema(schema: SchemaRecord): SchemaResponse {
  return {
    id: schema.id,
    name: schema.name,
    version: schema.version,
    description: schema.description,
    schema_definition: schema.schema_definition,
    created_at: schema.created_at.toISOString(),
    updated_at: schema.updated_at.toISOString(),
  };
}

export function serializeLog(log: LogRecord): LogResponse {
  return {
    id: log.id,
    schema_id: log.schema_id,
    log_data: log.log_data,
    created_at: log.created_at.toISOString(),
  };
}
