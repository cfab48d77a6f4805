import { eq, and, desc, type SQL } from 'drizzle-orm';
import { StoreError } from '../../application/index.js';
import type { SchemaListFilter, SchemaStore } from '../../application/index.js';
import type { SchemaRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { guarded } from './pg-errors.js';
import { schemas } from './schema.js';

/** Row shape returned by schema queries. */
export type SchemaRow = typeof schemas.$inferSelect;

export type SchemaUpdateFields = Pick<
  SchemaRow,
  'name' | 'version' | 'description' | 'schema_definition' | 'updated_at'
>;

/**
 * Lists schemas, newest first. Each combination of set filters becomes its
 * own exact-match WHERE clause.
 */
export async function findSchemas(db: Database, filter: SchemaListFilter): Promise<SchemaRow[]> {
  const conditions: SQL[] = [];

  if (filter.name !== undefined) {
    conditions.push(eq(schemas.name, filter.name));
  }
  if (filter.version !== undefined) {
    conditions.push(eq(schemas.version, filter.version));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  return db
    .select()
    .from(schemas)
    .where(whereClause)
    .orderBy(desc(schemas.created_at));
}

export async function findSchemaById(db: Database, id: string): Promise<SchemaRow | undefined> {
  const rows = await db.select().from(schemas).where(eq(schemas.id, id)).limit(1);
  return rows[0];
}

export async function findSchemaByNameVersion(
  db: Database,
  name: string,
  version: string,
): Promise<SchemaRow | undefined> {
  const rows = await db
    .select()
    .from(schemas)
    .where(and(eq(schemas.name, name), eq(schemas.version, version)))
    .limit(1);
  return rows[0];
}

export async function insertSchema(db: Database, schema: SchemaRecord): Promise<SchemaRow> {
  const [row] = await db.insert(schemas).values({
    id: schema.id,
    name: schema.name,
    version: schema.version,
    description: schema.description,
    schema_definition: schema.schema_definition,
    created_at: schema.created_at,
    updated_at: schema.updated_at,
  }).returning();

  if (row === undefined) {
    throw new StoreError('unknown', `Insert of schema '${schema.id}' returned no row`);
  }
  return row;
}

export async function updateSchema(
  db: Database,
  id: string,
  fields: SchemaUpdateFields,
): Promise<SchemaRow | undefined> {
  const rows = await db.update(schemas).set({
    name: fields.name,
    version: fields.version,
    description: fields.description,
    schema_definition: fields.schema_definition,
    updated_at: fields.updated_at,
  }).where(eq(schemas.id, id)).returning();

  return rows[0];
}

export async function deleteSchema(db: Database, id: string): Promise<boolean> {
  const rows = await db.delete(schemas).where(eq(schemas.id, id)).returning({ id: schemas.id });
  return rows.length > 0;
}

/** SchemaStore backed by PostgreSQL. Driver failures surface as StoreErrors. */
export function createSchemaStore(db: Database): SchemaStore {
  return {
    list: (filter) => guarded(() => findSchemas(db, filter)),
    findById: (id) => guarded(() => findSchemaById(db, id)),
    findByNameVersion: (name, version) => guarded(() => findSchemaByNameVersion(db, name, version)),
    insert: (schema) => guarded(() => insertSchema(db, schema)),
    update: (id, fields) => guarded(() => updateSchema(db, id, fields)),
    delete: (id) => guarded(() => deleteSchema(db, id)),
  };
}
