import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createLogBodySchema, translateQueryFilter } from '../../application/index.js';
import type { QueryParams } from '../../application/index.js';
import { NotFoundError } from '../../domain/index.js';
import { requestValidationError } from './errors.js';
import { parseLogId, requireSegment } from './params.js';
import { serializeLog } from './serializers.js';

/**
 * Log routes.
 *
 * POST   /logs                           validate and store a log
 * GET    /logs/:id                       get by id
 * DELETE /logs/:id                       delete
 * GET    /logs/schema/:name              logs of the default version of a schema
 * GET    /logs/schema/:name/:version     logs of a schema; every query
 *                                         parameter becomes a containment filter
 */
async function logRoutes(fastify: FastifyInstance): Promise<void> {
  const ingestion = fastify.logIngestion;
  const defaultVersion = fastify.serverConfig.logs.default_schema_version;

  // ── POST /logs ───────────────────────────────────────────
  fastify.post(
    '/logs',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createLogBodySchema.safeParse(request.body);
      if (!parsed.success) {
        throw requestValidationError(parsed.error, 'BadRequest');
      }

      const created = await ingestion.create(parsed.data.schema_id, parsed.data.log_data);
      return reply.status(201).send(serializeLog(created));
    },
  );

  // ── GET /logs/:id ────────────────────────────────────────
  fastify.get(
    '/logs/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const id = parseLogId(request.params.id);

      const log = await ingestion.getById(id);
      if (log === null) {
        throw new NotFoundError(`Log with id '${id}' not found`);
      }

      return reply.status(200).send(serializeLog(log));
    },
  );

  // ── DELETE /logs/:id ─────────────────────────────────────
  fastify.delete(
    '/logs/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const id = parseLogId(request.params.id);

      const deleted = await ingestion.delete(id);
      if (!deleted) {
        throw new NotFoundError(`Log with id '${id}' not found`);
      }

      return reply.status(204).send();
    },
  );

  // ── GET /logs/schema/:name ───────────────────────────────
  fastify.get(
    '/logs/schema/:name',
    async (
      request: FastifyRequest<{ Params: { name: string }; Querystring: QueryParams }>,
      reply: FastifyReply,
    ) => {
      const name = requireSegment(request.params.name, 'Schema name');
      const filter = translateQueryFilter(request.query);

      const rows = await ingestion.listBySchemaNameVersion(name, defaultVersion, filter);
      return reply.status(200).send({ logs: rows.map(serializeLog) });
    },
  );

  // ── GET /logs/schema/:name/:version ──────────────────────
  fastify.get(
    '/logs/schema/:name/:version',
    async (
      request: FastifyRequest<{ Params: { name: string; version: string }; Querystring: QueryParams }>,
      reply: FastifyReply,
    ) => {
      const name = requireSegment(request.params.name, 'Schema name');
      const version = requireSegment(request.params.version, 'Schema version');
      const filter = translateQueryFilter(request.query);

      const rows = await ingestion.listBySchemaNameVersion(name, version, filter);
      return reply.status(200).send({ logs: rows.map(serializeLog) });
    },
  );
}

export default fp(logRoutes, {
  name: 'log-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
