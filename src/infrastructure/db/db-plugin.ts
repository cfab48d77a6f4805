import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { LogStore, SchemaStore } from '../../application/index.js';
import { createDbClient } from './client.js';
import { ensureTables } from './migrate.js';
import { createLogStore } from './log-repository.js';
import { createSchemaStore } from './schema-repository.js';

export interface Stores {
  schemas: SchemaStore;
  logs: LogStore;
}

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Creates the tables when missing, decorates `fastify.stores` with the
 * PostgreSQL-backed stores, and closes the pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(options.databaseUrl);

  try {
    await ensureTables(sql);
  } catch (err: unknown) {
    await sql.end();
    throw err;
  }
  fastify.log.info('Database connected');

  const stores: Stores = {
    schemas: createSchemaStore(db),
    logs: createLogStore(db),
  };
  fastify.decorate('stores', stores);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.stores` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    stores: Stores;
  }
}
