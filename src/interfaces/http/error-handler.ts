import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { toAppError, toErrorBody } from './errors.js';

/**
 * Maps every error thrown by a route to `{ error, message, field_errors? }`
 * with the status of its kind. Server-side failures are logged with the
 * original error; their messages never reach the client.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);

    if (appError.statusCode >= 500) {
      request.log.error({ err: error, kind: appError.kind }, 'Request failed');
    } else {
      request.log.debug({ kind: appError.kind, message: appError.message }, 'Request rejected');
    }

    return reply.status(appError.statusCode).send(toErrorBody(appError));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFound',
      message: `Route ${request.method}:${request.url} not found`,
    });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
