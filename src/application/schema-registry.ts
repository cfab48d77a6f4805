import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  ConflictError,
  SchemaValidationError,
  ValidationError,
  isJsonObject,
} from '../domain/index.js';
import type { FieldErrors, JsonObject, SchemaRecord } from '../domain/index.js';
import type { LogStore, SchemaListFilter, SchemaStore } from './ports.js';
import { withStore } from './store-errors.js';
import { SchemaCompileError } from './validation-engine.js';
import type { ValidationEngine } from './validation-engine.js';

/** Fields accepted on create and on full-replace update. */
export interface SchemaInput {
  name: string;
  version: string;
  description?: string | null;
  schema_definition?: unknown;
}

export interface SchemaRegistryDeps {
  schemas: SchemaStore;
  logs: LogStore;
  engine: ValidationEngine;
  log: Logger;
}

/**
 * Owns the schema lifecycle.
 *
 * Uniqueness of (name, version) is pre-checked for a friendly error, but the
 * store's unique index is authoritative: a violation it reports is mapped to
 * the same Conflict the pre-check produces, so concurrent duplicate creates
 * resolve to exactly one success.
 */
export class SchemaRegistry {
  private readonly schemas: SchemaStore;
  private readonly logs: LogStore;
  private readonly engine: ValidationEngine;
  private readonly log: Logger;
  private readonly deletedListeners: Array<(id: string) => void> = [];

  constructor(deps: SchemaRegistryDeps) {
    this.schemas = deps.schemas;
    this.logs = deps.logs;
    this.engine = deps.engine;
    this.log = deps.log.child({ component: 'schema-registry' });
  }

  /** Registers a callback run after each successful schema delete. */
  onSchemaDeleted(listener: (id: string) => void): void {
    this.deletedListeners.push(listener);
  }

  async list(filter: SchemaListFilter = {}): Promise<SchemaRecord[]> {
    return withStore(() => this.schemas.list(filter));
  }

  async getById(id: string): Promise<SchemaRecord | null> {
    const row = await withStore(() => this.schemas.findById(id));
    return row ?? null;
  }

  async getByNameVersion(name: string, version: string): Promise<SchemaRecord | null> {
    const row = await withStore(() => this.schemas.findByNameVersion(name, version));
    return row ?? null;
  }

  async create(input: SchemaInput): Promise<SchemaRecord> {
    const definition = this.checkInput(input);
    const conflict = duplicateMessage(input.name, input.version);

    const existing = await withStore(() => this.schemas.findByNameVersion(input.name, input.version));
    if (existing !== undefined) {
      throw new ConflictError(conflict);
    }

    const now = new Date();
    const record: SchemaRecord = {
      id: randomUUID(),
      name: input.name,
      version: input.version,
      description: input.description ?? null,
      schema_definition: definition,
      created_at: now,
      updated_at: now,
    };

    const created = await withStore(() => this.schemas.insert(record), { conflict });
    this.log.info(
      { schema_id: created.id, name: created.name, version: created.version },
      'Schema created',
    );
    return created;
  }

  /** Full replace. Resolves null when `id` is unknown; `created_at` is kept. */
  async update(id: string, input: SchemaInput): Promise<SchemaRecord | null> {
    const definition = this.checkInput(input);
    const conflict = `${duplicateMessage(input.name, input.version)} with a different ID`;

    const current = await withStore(() => this.schemas.findById(id));
    if (current === undefined) return null;

    const clash = await withStore(() => this.schemas.findByNameVersion(input.name, input.version));
    if (clash !== undefined && clash.id !== id) {
      throw new ConflictError(conflict);
    }

    const updated = await withStore(
      () => this.schemas.update(id, {
        name: input.name,
        version: input.version,
        description: input.description ?? null,
        schema_definition: definition,
        updated_at: new Date(),
      }),
      { conflict },
    );

    if (updated === undefined) return null;
    this.log.info({ schema_id: id, name: updated.name, version: updated.version }, 'Schema updated');
    return updated;
  }

  /**
   * Deletes a schema. With dependent logs and no `force` this is a Conflict;
   * with `force` the logs go first. The two deletes are separate store calls:
   * if the second fails the caller retries the whole delete.
   */
  async delete(id: string, force: boolean): Promise<boolean> {
    const current = await withStore(() => this.schemas.findById(id));
    if (current === undefined) return false;

    const logCount = await withStore(() => this.logs.countBySchema(id));

    if (logCount > 0 && !force) {
      throw new ConflictError(
        `Cannot delete schema: ${logCount} log(s) are associated with this schema. ` +
          'Use force=true to delete schema and all associated logs.',
      );
    }

    if (force && logCount > 0) {
      const deletedLogs = await withStore(() => this.logs.deleteBySchema(id));
      this.log.info({ schema_id: id, deleted_logs: deletedLogs }, 'Deleted logs for schema');
    }

    const deleted = await withStore(() => this.schemas.delete(id), {
      // A log was written between the count and the delete.
      foreignKey: () =>
        new ConflictError(
          'Cannot delete schema: logs were added while deleting. Retry with force=true.',
        ),
    });

    if (deleted) {
      this.log.info({ schema_id: id, force }, 'Schema deleted');
      for (const listener of this.deletedListeners) listener(id);
    }
    return deleted;
  }

  /** Validates name/version/definition; returns the definition as an object. */
  private checkInput(input: SchemaInput): JsonObject {
    const fieldErrors: FieldErrors = {};
    if (input.name.trim() === '') {
      fieldErrors['name'] = ['Schema name cannot be empty'];
    }
    if (input.version.trim() === '') {
      fieldErrors['version'] = ['Schema version cannot be empty'];
    }

    const messages = Object.values(fieldErrors).flat();
    if (messages.length > 0) {
      throw new ValidationError(messages.join('; '), fieldErrors);
    }

    const definition = input.schema_definition;
    if (!isJsonObject(definition)) {
      const message = 'Schema definition must be a JSON object';
      throw new SchemaValidationError(message, { schema_definition: [message] });
    }

    try {
      this.engine.compile(definition);
    } catch (err: unknown) {
      if (err instanceof SchemaCompileError) {
        throw new SchemaValidationError(err.message, { schema_definition: [err.message] });
      }
      throw err;
    }

    return definition;
  }
}

function duplicateMessage(name: string, version: string): string {
  return `Schema with name '${name}' and version '${version}' already exists`;
}
