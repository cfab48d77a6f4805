import {
  createLogger,
  dbPlugin,
  loadEnv,
  loadServerConfig,
} from './infrastructure/index.js';
import { buildApp } from './app.js';

/**
 * Bootstrap.
 *
 * Environment and YAML config → root logger → Fastify app on PostgreSQL
 * stores → listen. SIGINT/SIGTERM close the app; `onClose` hooks end the
 * WebSocket sessions, then the database pool.
 */
async function main(): Promise<void> {
  const env = loadEnv();
  const config = loadServerConfig(env.configPath);
  const logger = createLogger(env.logLevel);

  logger.info({ config }, 'Server config loaded');

  const fastify = await buildApp({
    logger,
    config,
    registerStorage: async (app) => {
      await app.register(dbPlugin, { databaseUrl: env.databaseUrl });
    },
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: env.host,
    port: env.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
