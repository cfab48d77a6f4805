import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { StoreError } from '../src/application/index.js';
import type {
  LogStore,
  NewLog,
  SchemaListFilter,
  SchemaStore,
} from '../src/application/index.js';
import type { JsonObject, JsonValue, LogRecord, SchemaRecord } from '../src/domain/index.js';

/** Logger that writes nothing. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * In-process stand-in for the two PostgreSQL tables.
 *
 * Emulates what the services rely on: the unique (name, version) index,
 * the logs → schemas foreign key, serial log ids and `@>` containment.
 */
export class InMemoryDatabase {
  readonly schemaRows = new Map<string, SchemaRecord>();
  readonly logRows = new Map<number, LogRecord>();
  private nextLogId = 1;

  readonly schemas: SchemaStore = {
    list: async (filter: SchemaListFilter) =>
      [...this.schemaRows.values()]
        .filter((s) => filter.name === undefined || s.name === filter.name)
        .filter((s) => filter.version === undefined || s.version === filter.version)
        .sort((a, b) => b.created_at.getTime() - a.created_at.getTime()),

    findById: async (id) => this.schemaRows.get(id),

    findByNameVersion: async (name, version) =>
      [...this.schemaRows.values()].find((s) => s.name === name && s.version === version),

    insert: async (schema) => {
      this.assertUnique(schema.name, schema.version, schema.id);
      const row = { ...schema };
      this.schemaRows.set(row.id, row);
      return row;
    },

    update: async (id, fields) => {
      const current = this.schemaRows.get(id);
      if (current === undefined) return undefined;
      this.assertUnique(fields.name, fields.version, id);
      const row: SchemaRecord = { ...current, ...fields };
      this.schemaRows.set(id, row);
      return row;
    },

    delete: async (id) => {
      if (!this.schemaRows.has(id)) return false;
      if ([...this.logRows.values()].some((l) => l.schema_id === id)) {
        throw new StoreError('foreign_key_violation', 'logs reference this schema', {
          constraint: 'logs_schema_id_schemas_id_fk',
        });
      }
      return this.schemaRows.delete(id);
    },
  };

  readonly logs: LogStore = {
    listBySchema: async (schemaId: string, containment: JsonObject | null) =>
      [...this.logRows.values()]
        .filter((l) => l.schema_id === schemaId)
        .filter((l) => containment === null || contains(l.log_data, containment))
        .sort((a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id),

    findById: async (id) => this.logRows.get(id),

    insert: async (log: NewLog) => {
      if (!this.schemaRows.has(log.schema_id)) {
        throw new StoreError('foreign_key_violation', 'schema does not exist', {
          constraint: 'logs_schema_id_schemas_id_fk',
        });
      }
      const row: LogRecord = { id: this.nextLogId++, ...log };
      this.logRows.set(row.id, row);
      return row;
    },

    delete: async (id) => this.logRows.delete(id),

    countBySchema: async (schemaId) =>
      [...this.logRows.values()].filter((l) => l.schema_id === schemaId).length,

    deleteBySchema: async (schemaId) => {
      let removed = 0;
      for (const [id, log] of this.logRows) {
        if (log.schema_id === schemaId) {
          this.logRows.delete(id);
          removed++;
        }
      }
      return removed;
    },
  };

  private assertUnique(name: string, version: string, ownId: string): void {
    for (const row of this.schemaRows.values()) {
      if (row.name === name && row.version === version && row.id !== ownId) {
        throw new StoreError('unique_violation', 'duplicate key value violates unique constraint', {
          constraint: 'uq_schemas_name_version',
        });
      }
    }
  }
}

/** JSONB `@>` for the shapes log data and filters take. */
export function contains(value: JsonValue, filter: JsonValue): boolean {
  if (Array.isArray(filter)) {
    if (!Array.isArray(value)) return false;
    const items: JsonValue[] = value;
    return filter.every((f) => items.some((v) => contains(v, f)));
  }
  if (filter !== null && typeof filter === 'object') {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
    const record: JsonObject = value;
    return Object.entries(filter).every(([key, f]) => {
      const v = record[key];
      return v !== undefined && contains(v, f);
    });
  }
  return value === filter;
}

/** Registers the in-memory stores under the plugin name the services expect. */
export function inMemoryStorage(database: InMemoryDatabase) {
  return async (app: FastifyInstance): Promise<void> => {
    await app.register(
      fp(
        async (fastify: FastifyInstance) => {
          fastify.decorate('stores', { schemas: database.schemas, logs: database.logs });
        },
        { name: 'db', fastify: '5.x' },
      ),
    );
  };
}

/** Draft-07 definition requiring a string `message`. */
export const MESSAGE_SCHEMA: JsonObject = {
  type: 'object',
  properties: {
    message: { type: 'string' },
  },
  required: ['message'],
};
