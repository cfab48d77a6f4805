import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import {
  EventBroadcaster,
  LogIngestionService,
  SchemaRegistry,
  ValidationEngine,
} from '../application/index.js';
import type { ServerConfig } from './config/index.js';

export interface ServicesPluginOptions {
  config: ServerConfig;
  logger: Logger;
}

/**
 * Wires the application services over `fastify.stores`.
 *
 * One broadcaster per process; it is drained (every subscription closed)
 * when the server shuts down.
 */
async function servicesPlugin(fastify: FastifyInstance, options: ServicesPluginOptions): Promise<void> {
  const { config, logger } = options;
  const { schemas, logs } = fastify.stores;

  const engine = new ValidationEngine(logger);
  const broadcaster = new EventBroadcaster({
    capacity: config.websocket.buffer_capacity,
    log: logger,
  });
  const schemaRegistry = new SchemaRegistry({ schemas, logs, engine, log: logger });
  const logIngestion = new LogIngestionService({
    registry: schemaRegistry,
    logs,
    engine,
    publisher: broadcaster,
    log: logger,
    validatorCacheSize: config.logs.validator_cache_size,
  });

  fastify.decorate('serverConfig', config);
  fastify.decorate('appLogger', logger);
  fastify.decorate('broadcaster', broadcaster);
  fastify.decorate('schemaRegistry', schemaRegistry);
  fastify.decorate('logIngestion', logIngestion);

  fastify.addHook('onClose', async () => {
    broadcaster.closeAll();
  });
}

export default fp(servicesPlugin, {
  name: 'services',
  dependencies: ['db'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    serverConfig: ServerConfig;
    /** Root pino logger; components derive children from it. */
    appLogger: Logger;
    broadcaster: EventBroadcaster;
    schemaRegistry: SchemaRegistry;
    logIngestion: LogIngestionService;
  }
}
