import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  deleteSchemaQuerySchema,
  listSchemasQuerySchema,
  schemaBodySchema,
} from '../../application/index.js';
import { NotFoundError } from '../../domain/index.js';
import { requestValidationError } from './errors.js';
import { parseSchemaId, requireSegment } from './params.js';
import { serializeSchema } from './serializers.js';

/**
 * Schema registry routes.
 *
 * GET    /schemas                   list, optional ?name= and ?version=
 * POST   /schemas                   register a schema
 * GET    /schemas/:id               get by id
 * PUT    /schemas/:id               full replace
 * DELETE /schemas/:id               delete, ?force=true also removes its logs
 * GET    /schemas/:name/:version    get by name and version
 */
async function schemaRoutes(fastify: FastifyInstance): Promise<void> {
  const registry = fastify.schemaRegistry;

  // ── GET /schemas ─────────────────────────────────────────
  fastify.get(
    '/schemas',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = listSchemasQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw requestValidationError(parsed.error);
      }

      const rows = await registry.list(parsed.data);
      return reply.status(200).send({ schemas: rows.map(serializeSchema) });
    },
  );

  // ── POST /schemas ────────────────────────────────────────
  fastify.post(
    '/schemas',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = schemaBodySchema.safeParse(request.body);
      if (!parsed.success) {
        throw requestValidationError(parsed.error);
      }

      const created = await registry.create(parsed.data);
      return reply
        .status(201)
        .header('location', `/schemas/${created.id}`)
        .send(serializeSchema(created));
    },
  );

  // ── GET /schemas/:id ─────────────────────────────────────
  fastify.get(
    '/schemas/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const id = parseSchemaId(request.params.id);

      const schema = await registry.getById(id);
      if (schema === null) {
        throw new NotFoundError(`Schema with id '${id}' not found`);
      }

      return reply.status(200).send(serializeSchema(schema));
    },
  );

  // ── PUT /schemas/:id ─────────────────────────────────────
  fastify.put(
    '/schemas/:id',
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const id = parseSchemaId(request.params.id);

      const parsed = schemaBodySchema.safeParse(request.body);
      if (!parsed.success) {
        throw requestValidationError(parsed.error);
      }

      const updated = await registry.update(id, parsed.data);
      if (updated === null) {
        throw new NotFoundError(`Schema with id '${id}' not found`);
      }

      return reply.status(200).send(serializeSchema(updated));
    },
  );

  // ── DELETE /schemas/:id ──────────────────────────────────
  fastify.delete(
    '/schemas/:id',
    async (
      request: FastifyRequest<{ Params: { id: string }; Querystring: unknown }>,
      reply: FastifyReply,
    ) => {
      const id = parseSchemaId(request.params.id);

      const parsed = deleteSchemaQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw requestValidationError(parsed.error);
      }

      const deleted = await registry.delete(id, parsed.data.force);
      if (!deleted) {
        throw new NotFoundError(`Schema with id '${id}' not found`);
      }

      return reply.status(204).send();
    },
  );

  // ── GET /schemas/:name/:version ──────────────────────────
  fastify.get(
    '/schemas/:name/:version',
    async (
      request: FastifyRequest<{ Params: { name: string; version: string } }>,
      reply: FastifyReply,
    ) => {
      const name = requireSegment(request.params.name, 'Schema name');
      const version = requireSegment(request.params.version, 'Schema version');

      const schema = await registry.getByNameVersion(name, version);
      if (schema === null) {
        throw new NotFoundError(`Schema with name:version '${name}:${version}' not found`);
      }

      return reply.status(200).send(serializeSchema(schema));
    },
  );
}

export default fp(schemaRoutes, {
  name: 'schema-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
