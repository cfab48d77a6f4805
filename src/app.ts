import { randomUUID } from 'node:crypto';
import cors from '@fastify/cors';
import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { servicesPlugin } from './infrastructure/index.js';
import type { ServerConfig } from './infrastructure/index.js';
import {
  errorHandler,
  healthRoutes,
  logRoutes,
  schemaRoutes,
} from './interfaces/http/index.js';
import { wsPlugin } from './interfaces/ws/index.js';

export interface BuildAppOptions {
  logger: Logger;
  config: ServerConfig;
  /**
   * Registers the plugin named `db` that decorates `fastify.stores`:
   * PostgreSQL in production, in-memory stores in tests.
   */
  registerStorage: (app: FastifyInstance) => Promise<void>;
}

/**
 * Builds the Fastify application without listening.
 *
 * Order:
 * 1) Storage plugin
 * 2) Application services
 * 3) CORS, error handling and HTTP routes
 * 4) WebSocket stream (when enabled)
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { logger, config } = options;
  const loggerInstance: FastifyBaseLogger = logger;

  const fastify = Fastify({
    loggerInstance,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'request_id',
    genReqId: () => randomUUID(),
  });

  fastify.addHook('onSend', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await options.registerStorage(fastify);
  await fastify.register(servicesPlugin, { config, logger });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  // Any origin, no credentials.
  await fastify.register(cors, {
    origin: '*',
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE'],
    exposedHeaders: ['Location', 'X-Request-ID'],
  });
  await fastify.register(errorHandler);
  await fastify.register(healthRoutes);
  await fastify.register(schemaRoutes);
  await fastify.register(logRoutes);

  // --------------------------------------------------
  // WebSocket Interface
  // --------------------------------------------------

  if (config.websocket.enabled) {
    await fastify.register(wsPlugin);
  }

  return fastify;
}
