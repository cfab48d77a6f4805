import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { WebSocketServer } from './websocket-server.js';

/**
 * Attaches the live log stream to Fastify's HTTP server and closes every
 * session on shutdown.
 */
async function wsPlugin(fastify: FastifyInstance): Promise<void> {
  const { websocket } = fastify.serverConfig;

  const wsServer = new WebSocketServer({
    broadcaster: fastify.broadcaster,
    registry: fastify.schemaRegistry,
    log: fastify.appLogger,
    path: websocket.path,
    heartbeatIntervalMs: websocket.heartbeat_interval_ms,
  });

  wsServer.attach(fastify.server);
  fastify.decorate('wsServer', wsServer);

  fastify.addHook('onClose', async () => {
    await wsServer.close();
  });
}

export default fp(wsPlugin, {
  name: 'websocket',
  dependencies: ['services'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    wsServer: WebSocketServer;
  }
}
