import type { Logger } from 'pino';
import {
  InternalError,
  NotFoundError,
  SchemaValidationError,
} from '../domain/index.js';
import type { DomainEvent, JsonObject, LogRecord, SchemaRecord } from '../domain/index.js';
import type { LogStore } from './ports.js';
import type { SchemaRegistry } from './schema-registry.js';
import { withStore } from './store-errors.js';
import {
  SchemaCompileError,
  formatPathErrors,
  pathErrorsToFieldErrors,
} from './validation-engine.js';
import type { ValidationEngine, Validator } from './validation-engine.js';

/** Anything that accepts domain events for fan-out. */
export interface EventPublisher {
  publish(event: DomainEvent): number;
}

export interface LogIngestionDeps {
  registry: SchemaRegistry;
  logs: LogStore;
  engine: ValidationEngine;
  publisher: EventPublisher;
  log: Logger;
  /** Compiled validators kept at most; least recently used go first. */
  validatorCacheSize?: number;
}

export const DEFAULT_VALIDATOR_CACHE_SIZE = 256;

/**
 * Write and read paths for log records.
 *
 * Create: resolve schema → validate → persist → publish. Events go out only
 * after the store call has returned, so a subscriber never sees an id that
 * cannot yet be fetched. Publishing is best-effort and never fails a write.
 */
export class LogIngestionService {
  private readonly registry: SchemaRegistry;
  private readonly logs: LogStore;
  private readonly engine: ValidationEngine;
  private readonly publisher: EventPublisher;
  private readonly log: Logger;
  /** Compiled validators by schema id, tagged with the serialized definition. */
  private readonly validators = new Map<string, { stamp: string; validator: Validator }>();
  private readonly validatorCacheSize: number;

  constructor(deps: LogIngestionDeps) {
    this.registry = deps.registry;
    this.logs = deps.logs;
    this.engine = deps.engine;
    this.publisher = deps.publisher;
    this.log = deps.log.child({ component: 'log-ingestion' });
    this.validatorCacheSize = deps.validatorCacheSize ?? DEFAULT_VALIDATOR_CACHE_SIZE;
    if (!Number.isInteger(this.validatorCacheSize) || this.validatorCacheSize < 1) {
      throw new RangeError(`Validator cache size must be a positive integer, got ${this.validatorCacheSize}`);
    }

    this.registry.onSchemaDeleted((id) => {
      this.validators.delete(id);
    });
  }

  /** Number of compiled validators currently cached. */
  get cachedValidators(): number {
    return this.validators.size;
  }

  async create(schemaId: string, logData: JsonObject): Promise<LogRecord> {
    const schema = await this.registry.getById(schemaId);
    if (schema === null) {
      this.validators.delete(schemaId);
      throw new NotFoundError(`Schema with id '${schemaId}' not found`);
    }

    const errors = this.engine.validate(this.validatorFor(schema), logData);
    if (errors.length > 0) {
      throw new SchemaValidationError(
        `Schema validation failed: ${formatPathErrors(errors)}`,
        pathErrorsToFieldErrors(errors),
      );
    }

    const created = await withStore(
      () => this.logs.insert({ schema_id: schemaId, log_data: logData, created_at: new Date() }),
      {
        // The schema was deleted after it was resolved above.
        foreignKey: () => new NotFoundError(`Schema with id '${schemaId}' not found`),
      },
    );

    this.safePublish({
      event_type: 'created',
      id: created.id,
      schema_id: created.schema_id,
      log_data: created.log_data,
      created_at: created.created_at.toISOString(),
    });

    this.log.debug({ log_id: created.id, schema_id: schemaId }, 'Log created');
    return created;
  }

  async getById(id: number): Promise<LogRecord | null> {
    const row = await withStore(() => this.logs.findById(id));
    return row ?? null;
  }

  /** Newest first. */
  async listByOwningSchema(schemaId: string, filter: JsonObject | null = null): Promise<LogRecord[]> {
    const rows = await withStore(() => this.logs.listBySchema(schemaId, filter));
    this.log.debug(
      { schema_id: schemaId, count: rows.length, filter_keys: filter === null ? [] : Object.keys(filter) },
      'Fetched logs for schema',
    );
    return rows;
  }

  async listBySchemaNameVersion(
    name: string,
    version: string,
    filter: JsonObject | null = null,
  ): Promise<LogRecord[]> {
    const schema = await this.registry.getByNameVersion(name, version);
    if (schema === null) {
      throw new NotFoundError(`Schema with name:version '${name}:${version}' not found`);
    }
    return this.listByOwningSchema(schema.id, filter);
  }

  async delete(id: number): Promise<boolean> {
    // The row is gone after the delete; remember which schema owned it.
    const existing = await withStore(() => this.logs.findById(id));
    if (existing === undefined) return false;

    const deleted = await withStore(() => this.logs.delete(id));
    if (!deleted) return false;

    this.safePublish({ event_type: 'deleted', id, schema_id: existing.schema_id });
    this.log.debug({ log_id: id, schema_id: existing.schema_id }, 'Log deleted');
    return true;
  }

  private validatorFor(schema: SchemaRecord): Validator {
    const stamp = JSON.stringify(schema.schema_definition);
    const cached = this.validators.get(schema.id);
    if (cached !== undefined && cached.stamp === stamp) {
      // Re-insert to mark as most recently used.
      this.validators.delete(schema.id);
      this.validators.set(schema.id, cached);
      return cached.validator;
    }

    let validator: Validator;
    try {
      validator = this.engine.compile(schema.schema_definition);
    } catch (err: unknown) {
      if (err instanceof SchemaCompileError) {
        throw new InternalError(`Stored definition for schema '${schema.id}' does not compile`, err);
      }
      throw err;
    }

    this.validators.delete(schema.id);
    this.validators.set(schema.id, { stamp, validator });
    if (this.validators.size > this.validatorCacheSize) {
      const oldest = this.validators.keys().next();
      if (oldest.done !== true) this.validators.delete(oldest.value);
    }
    return validator;
  }

  private safePublish(event: DomainEvent): void {
    try {
      const delivered = this.publisher.publish(event);
      this.log.debug({ event_type: event.event_type, log_id: event.id, delivered }, 'Event published');
    } catch (err: unknown) {
      this.log.warn({ err, event_type: event.event_type, log_id: event.id }, 'Event publish failed');
    }
  }
}
