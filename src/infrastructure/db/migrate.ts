import type { Sql } from './client.js';

/**
 * Ensures tables and indexes exist (lightweight migration via raw SQL).
 *
 * Mirrors `schema.ts`; drizzle-kit generates proper migrations from that
 * file, but this keeps a fresh local database usable on first start.
 */
export async function ensureTables(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS schemas (
      id                 VARCHAR(255) PRIMARY KEY,
      name               VARCHAR(255) NOT NULL,
      version            VARCHAR(50)  NOT NULL,
      description        TEXT,
      schema_definition  JSONB        NOT NULL,
      created_at         TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at         TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS logs (
      id          SERIAL PRIMARY KEY,
      schema_id   VARCHAR(255) NOT NULL REFERENCES schemas(id),
      log_data    JSONB        NOT NULL,
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS uq_schemas_name_version ON schemas (name, version)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_schemas_name ON schemas (name)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_logs_schema_id ON logs (schema_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_logs_created_at ON logs (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_logs_data_gin ON logs USING GIN (log_data)`);
}
