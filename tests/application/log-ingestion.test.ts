import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBroadcaster } from '../../src/application/event-broadcaster.js';
import { LogIngestionService } from '../../src/application/log-ingestion.js';
import type { EventPublisher } from '../../src/application/log-ingestion.js';
import { SchemaRegistry } from '../../src/application/schema-registry.js';
import { ValidationEngine } from '../../src/application/validation-engine.js';
import {
  InternalError,
  NotFoundError,
  SchemaValidationError,
} from '../../src/domain/index.js';
import type { DomainEvent, SchemaRecord } from '../../src/domain/index.js';
import { InMemoryDatabase, MESSAGE_SCHEMA, silentLogger } from '../helpers.js';

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

let database: InMemoryDatabase;
let registry: SchemaRegistry;
let published: DomainEvent[];
let publisher: EventPublisher;
let service: LogIngestionService;
let schema: SchemaRecord;

beforeEach(async () => {
  database = new InMemoryDatabase();
  const engine = new ValidationEngine();
  const log = silentLogger();
  registry = new SchemaRegistry({ schemas: database.schemas, logs: database.logs, engine, log });
  published = [];
  publisher = {
    publish: vi.fn((event: DomainEvent) => {
      published.push(event);
      return 1;
    }),
  };
  service = new LogIngestionService({ registry, logs: database.logs, engine, publisher, log });
  schema = await registry.create({ name: 's', version: '1.0.0', schema_definition: MESSAGE_SCHEMA });
});

// ─── create ──────────────────────────────────────────────────

describe('LogIngestionService.create', () => {
  it('stores a conforming log and echoes its data', async () => {
    const created = await service.create(schema.id, { message: 'hi' });

    expect(created).toMatchObject({ id: 1, schema_id: schema.id, log_data: { message: 'hi' } });
    expect(await service.getById(created.id)).toEqual(created);
  });

  it('publishes a created event after storing', async () => {
    const created = await service.create(schema.id, { message: 'hi' });

    expect(published).toEqual([
      {
        event_type: 'created',
        id: created.id,
        schema_id: schema.id,
        log_data: { message: 'hi' },
        created_at: created.created_at.toISOString(),
      },
    ]);
  });

  it('rejects a log missing a required field', async () => {
    const err = await service.create(schema.id, { other: 'x' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SchemaValidationError);
    expect(err).toMatchObject({
      message: "Schema validation failed: Validation error at '/message': must have required property 'message'",
      fieldErrors: { '/message': ["must have required property 'message'"] },
    });
    expect(database.logRows.size).toBe(0);
    expect(published).toEqual([]);
  });

  it('lists every violated path', async () => {
    const strict = await registry.create({
      name: 'strict',
      version: '1',
      schema_definition: {
        type: 'object',
        properties: { level: { type: 'string' }, code: { type: 'integer' } },
        required: ['level', 'code'],
      },
    });

    await expect(service.create(strict.id, { level: 1, code: 'x' })).rejects.toMatchObject({
      fieldErrors: {
        '/level': ['must be string'],
        '/code': ['must be integer'],
      },
    });
  });

  it('rejects an unknown schema', async () => {
    await expect(service.create(UNKNOWN_ID, { message: 'hi' })).rejects.toThrow(
      new NotFoundError(`Schema with id '${UNKNOWN_ID}' not found`),
    );
  });

  it('maps a schema deleted before the insert to NotFound', async () => {
    vi.spyOn(registry, 'getById').mockResolvedValueOnce({ ...schema, id: UNKNOWN_ID });

    await expect(service.create(UNKNOWN_ID, { message: 'hi' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('does not fail the write when publishing throws', async () => {
    vi.mocked(publisher.publish).mockImplementationOnce(() => {
      throw new Error('broadcaster gone');
    });

    const created = await service.create(schema.id, { message: 'still stored' });
    expect(database.logRows.get(created.id)?.log_data).toEqual({ message: 'still stored' });
  });

  it('recompiles after the definition changes', async () => {
    await service.create(schema.id, { message: 'v1' });
    await registry.update(schema.id, {
      name: 's',
      version: '1.0.0',
      schema_definition: { type: 'object', required: ['level'] },
    });

    await expect(service.create(schema.id, { message: 'no level' })).rejects.toBeInstanceOf(
      SchemaValidationError,
    );
    await expect(service.create(schema.id, { level: 'info' })).resolves.toMatchObject({
      log_data: { level: 'info' },
    });
  });

  it('raises InternalError when a stored definition no longer compiles', async () => {
    database.schemaRows.set(schema.id, { ...schema, schema_definition: { type: 'strng' } });

    await expect(service.create(schema.id, { message: 'hi' })).rejects.toBeInstanceOf(InternalError);
  });
});

// ─── validator cache ─────────────────────────────────────────

describe('LogIngestionService validator cache', () => {
  it('compiles a definition once across writes', async () => {
    const engine = new ValidationEngine();
    const compile = vi.spyOn(engine, 'compile');
    const cached = new LogIngestionService({ registry, logs: database.logs, engine, publisher, log: silentLogger() });

    await cached.create(schema.id, { message: 'a' });
    await cached.create(schema.id, { message: 'b' });

    expect(compile).toHaveBeenCalledTimes(1);
    expect(cached.cachedValidators).toBe(1);
  });

  it('drops the entry when its schema is deleted', async () => {
    await service.create(schema.id, { message: 'hi' });
    expect(service.cachedValidators).toBe(1);

    await registry.delete(schema.id, true);

    expect(service.cachedValidators).toBe(0);
  });

  it('drops the entry when its schema is no longer found', async () => {
    await service.create(schema.id, { message: 'hi' });
    database.schemaRows.delete(schema.id);

    await expect(service.create(schema.id, { message: 'hi' })).rejects.toBeInstanceOf(NotFoundError);
    expect(service.cachedValidators).toBe(0);
  });

  it('evicts the least recently used validator past its size', async () => {
    const engine = new ValidationEngine();
    const compile = vi.spyOn(engine, 'compile');
    const small = new LogIngestionService({
      registry,
      logs: database.logs,
      engine,
      publisher,
      log: silentLogger(),
      validatorCacheSize: 2,
    });
    const second = await registry.create({ name: 's', version: '2.0.0', schema_definition: MESSAGE_SCHEMA });
    const third = await registry.create({ name: 's', version: '3.0.0', schema_definition: MESSAGE_SCHEMA });

    await small.create(schema.id, { message: '1' });
    await small.create(second.id, { message: '2' });
    await small.create(schema.id, { message: '1 again' });
    await small.create(third.id, { message: '3' });
    expect(small.cachedValidators).toBe(2);
    expect(compile).toHaveBeenCalledTimes(3);

    // `schema` was used more recently than `second`, so it survived.
    await small.create(schema.id, { message: '1 once more' });
    expect(compile).toHaveBeenCalledTimes(3);

    await small.create(second.id, { message: '2 again' });
    expect(compile).toHaveBeenCalledTimes(4);
  });

  it('rejects a cache size below one', () => {
    expect(
      () =>
        new LogIngestionService({
          registry,
          logs: database.logs,
          engine: new ValidationEngine(),
          publisher,
          log: silentLogger(),
          validatorCacheSize: 0,
        }),
    ).toThrow(RangeError);
  });
});

// ─── reads ───────────────────────────────────────────────────

describe('LogIngestionService reads', () => {
  beforeEach(async () => {
    await service.create(schema.id, { message: 'a', level: 'info', meta: { region: 'eu', zone: 1 } });
    await service.create(schema.id, { message: 'b', level: 'error', meta: { region: 'us' } });
    await service.create(schema.id, { message: 'c', level: 'error', meta: { region: 'eu' } });
  });

  it('lists newest first', async () => {
    const rows = await service.listByOwningSchema(schema.id);
    expect(rows.map((l) => l.log_data['message'])).toEqual(['c', 'b', 'a']);
  });

  it('applies a containment filter', async () => {
    const rows = await service.listBySchemaNameVersion('s', '1.0.0', { level: 'error' });
    expect(rows.map((l) => l.log_data['message'])).toEqual(['c', 'b']);
  });

  it('matches nested objects by containment', async () => {
    const rows = await service.listBySchemaNameVersion('s', '1.0.0', { meta: { region: 'eu' } });
    expect(rows.map((l) => l.log_data['message'])).toEqual(['c', 'a']);
  });

  it('matches nothing for an unknown key', async () => {
    expect(await service.listBySchemaNameVersion('s', '1.0.0', { missing: 1 })).toEqual([]);
  });

  it('rejects an unknown name and version', async () => {
    await expect(service.listBySchemaNameVersion('s', '9.0.0')).rejects.toThrow(
      new NotFoundError("Schema with name:version 's:9.0.0' not found"),
    );
  });

  it('returns null for an unknown log id', async () => {
    expect(await service.getById(999)).toBeNull();
  });
});

// ─── delete ──────────────────────────────────────────────────

describe('LogIngestionService.delete', () => {
  it('deletes once and publishes a deleted event', async () => {
    const created = await service.create(schema.id, { message: 'bye' });
    published.length = 0;

    expect(await service.delete(created.id)).toBe(true);
    expect(await service.getById(created.id)).toBeNull();
    expect(published).toEqual([{ event_type: 'deleted', id: created.id, schema_id: schema.id }]);

    expect(await service.delete(created.id)).toBe(false);
    expect(published).toHaveLength(1);
  });
});

// ─── end to end with the broadcaster ─────────────────────────

describe('LogIngestionService with EventBroadcaster', () => {
  it('delivers created then deleted to an unfiltered subscriber', async () => {
    const log = silentLogger();
    const broadcaster = new EventBroadcaster({ log });
    const live = new LogIngestionService({
      registry,
      logs: database.logs,
      engine: new ValidationEngine(),
      publisher: broadcaster,
      log,
    });
    const subscription = broadcaster.subscribe();

    const created = await live.create(schema.id, { message: 'hi' });
    await live.delete(created.id);

    const first = await subscription.next();
    const second = await subscription.next();

    expect(first.value).toMatchObject({ event_type: 'created', id: created.id, schema_id: schema.id });
    expect(second.value).toEqual({ event_type: 'deleted', id: created.id, schema_id: schema.id });
    expect(subscription.pending).toBe(0);
    subscription.close();
  });
});
