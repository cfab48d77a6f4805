import { eq, and, desc, count, sql, type SQL } from 'drizzle-orm';
import { StoreError } from '../../application/index.js';
import type { LogStore, NewLog } from '../../application/index.js';
import type { JsonObject } from '../../domain/index.js';
import type { Database } from './client.js';
import { guarded } from './pg-errors.js';
import { logs } from './schema.js';

/** Row shape returned by log queries. */
export type LogRow = typeof logs.$inferSelect;

/**
 * Fetches the logs of one schema, newest first.
 *
 * `containment` becomes `log_data @> $filter::jsonb`: a row matches when its
 * data holds every given key with an equal (or, for nested objects and
 * arrays, containing) value.
 */
export async function findLogsBySchema(
  db: Database,
  schemaId: string,
  containment: JsonObject | null,
): Promise<LogRow[]> {
  const conditions: SQL[] = [eq(logs.schema_id, schemaId)];

  if (containment !== null) {
    conditions.push(sql`${logs.log_data} @> ${JSON.stringify(containment)}::jsonb`);
  }

  return db
    .select()
    .from(logs)
    .where(and(...conditions))
    .orderBy(desc(logs.created_at), desc(logs.id));
}

export async function findLogById(db: Database, id: number): Promise<LogRow | undefined> {
  const rows = await db.select().from(logs).where(eq(logs.id, id)).limit(1);
  return rows[0];
}

export async function insertLog(db: Database, log: NewLog): Promise<LogRow> {
  const [row] = await db.insert(logs).values({
    schema_id: log.schema_id,
    log_data: log.log_data,
    created_at: log.created_at,
  }).returning();

  if (row === undefined) {
    throw new StoreError('unknown', 'Insert of log returned no row');
  }
  return row;
}

export async function deleteLog(db: Database, id: number): Promise<boolean> {
  const rows = await db.delete(logs).where(eq(logs.id, id)).returning({ id: logs.id });
  return rows.length > 0;
}

export async function countLogsBySchema(db: Database, schemaId: string): Promise<number> {
  const rows = await db
    .select({ value: count() })
    .from(logs)
    .where(eq(logs.schema_id, schemaId));
  return Number(rows[0]?.value ?? 0);
}

/** Returns how many logs were removed. */
export async function deleteLogsBySchema(db: Database, schemaId: string): Promise<number> {
  const rows = await db.delete(logs).where(eq(logs.schema_id, schemaId)).returning({ id: logs.id });
  return rows.length;
}

/** LogStore backed by PostgreSQL. Driver failures surface as StoreErrors. */
export function createLogStore(db: Database): LogStore {
  return {
    listBySchema: (schemaId, containment) => guarded(() => findLogsBySchema(db, schemaId, containment)),
    findById: (id) => guarded(() => findLogById(db, id)),
    insert: (log) => guarded(() => insertLog(db, log)),
    delete: (id) => guarded(() => deleteLog(db, id)),
    countBySchema: (schemaId) => guarded(() => countLogsBySchema(db, schemaId)),
    deleteBySchema: (schemaId) => guarded(() => deleteLogsBySchema(db, schemaId)),
  };
}
