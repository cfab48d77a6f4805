import type { JsonObject, LogRecord, SchemaRecord } from '../domain/index.js';

/**
 * Storage contracts consumed by the registry and the ingestion service.
 *
 * Implementations live in infrastructure/db (PostgreSQL via Drizzle).
 * Each method is a single round trip to the store; no locks are held
 * across calls.
 */

/** Exact-match filter for schema listing. Unset fields are not applied. */
export interface SchemaListFilter {
  name?: string;
  version?: string;
}

export interface SchemaStore {
  /** Newest first (created_at DESC). */
  list(filter: SchemaListFilter): Promise<SchemaRecord[]>;
  findById(id: string): Promise<SchemaRecord | undefined>;
  findByNameVersion(name: string, version: string): Promise<SchemaRecord | undefined>;
  insert(schema: SchemaRecord): Promise<SchemaRecord>;
  /** Full replace of the mutable fields. Resolves undefined for an unknown id. */
  update(
    id: string,
    fields: Pick<SchemaRecord, 'name' | 'version' | 'description' | 'schema_definition' | 'updated_at'>,
  ): Promise<SchemaRecord | undefined>;
  delete(id: string): Promise<boolean>;
}

export interface NewLog {
  schema_id: string;
  log_data: JsonObject;
  created_at: Date;
}

export interface LogStore {
  /**
   * Logs owned by `schemaId`, newest first. When `containment` is set, only
   * logs whose data structurally contains it are returned.
   */
  listBySchema(schemaId: string, containment: JsonObject | null): Promise<LogRecord[]>;
  findById(id: number): Promise<LogRecord | undefined>;
  insert(log: NewLog): Promise<LogRecord>;
  delete(id: number): Promise<boolean>;
  countBySchema(schemaId: string): Promise<number>;
  deleteBySchema(schemaId: string): Promise<number>;
}

export type StoreErrorReason = 'unique_violation' | 'foreign_key_violation' | 'unknown';

/**
 * Raised by store implementations. Carries a classification of the
 * underlying driver failure so callers can map it without knowing the
 * database dialect.
 */
export class StoreError extends Error {
  readonly reason: StoreErrorReason;
  readonly constraint?: string;

  constructor(reason: StoreErrorReason, message: string, options?: { constraint?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'StoreError';
    this.reason = reason;
    this.constraint = options?.constraint;
  }
}
