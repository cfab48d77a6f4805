import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { SERVICE_NAME } from '../../infrastructure/logger.js';

/**
 * GET /         liveness
 * GET /health   same payload
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const health = async (_request: unknown, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      subscribers: fastify.broadcaster.size,
    });
  };

  fastify.get('/', health);
  fastify.get('/health', health);
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
