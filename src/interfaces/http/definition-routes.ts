import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createDefinitionSchema,
  patchDefinitionSchema,
  verifyDefinitionSchema,
  createDefinition,
  listDefinitions,
  getDefinition,
  updateDefinition,
  verifyDefinition,
  removeDefinition,
} from '../../application/index.js';
import { NotFoundError } from '../../domain/index.js';
import { publishDefinitionChange } from '../../infrastructure/index.js';
import { requestUserId, UUID_RE } from './request-context.js';

type WorkspaceRequest = FastifyRequest<{ Params: { workspace_id: string }; Body: unknown }>;
type DefinitionRequest = FastifyRequest<{ Params: { workspace_id: string; definition_id: string }; Body: unknown }>;

/**
 * Activation definition registry routes.
 *
 * GET    /api/v1/workspaces/:workspace_id/activations : list active
 * POST   /api/v1/workspaces/:workspace_id/activations : create (version 1)
 * GET    /api/v1/workspaces/:workspace_id/activations/:definition_id : get one
 * PATCH  /api/v1/workspaces/:workspace_id/activations/:definition_id : partial update (new version)
 * POST   /api/v1/workspaces/:workspace_id/activations/:definition_id/verify : mark verified
 * DELETE /api/v1/workspaces/:workspace_id/activations/:definition_id : soft delete
 *
 * Structural rule errors (ValidationError, 400 with `field`) and unknown
 * definitions (NotFoundError, 404) go through the shared error handler.
 */
async function definitionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /activations ─────────────────────────────────────
  fastify.get(
    '/api/v1/workspaces/:workspace_id/activations',
    async (request: WorkspaceRequest, reply: FastifyReply) => {
      const definitions = await listDefinitions(fastify.db, request.params.workspace_id);
      return reply.status(200).send(definitions);
    },
  );

  // ── POST /activations ────────────────────────────────────
  fastify.post(
    '/api/v1/workspaces/:workspace_id/activations',
    async (request: WorkspaceRequest, reply: FastifyReply) => {
      const parsed = createDefinitionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const created = await createDefinition(
        fastify.db,
        request.params.workspace_id,
        requestUserId(request),
        parsed.data,
      );
      await publishDefinitionChange(fastify.redis, fastify.log, 'create', created.definition_id);

      return reply.status(201).send(created);
    },
  );

  // ── GET /activations/:definition_id ──────────────────────
  fastify.get(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id',
    async (request: DefinitionRequest, reply: FastifyReply) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const definition = await getDefinition(fastify.db, workspace_id, definition_id);
      if (definition === null) {
        throw new NotFoundError('Activation definition not found');
      }

      return reply.status(200).send(definition);
    },
  );

  // ── PATCH /activations/:definition_id ────────────────────
  fastify.patch(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id',
    async (request: DefinitionRequest, reply: FastifyReply) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const parsed = patchDefinitionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const updated = await updateDefinition(
        fastify.db,
        workspace_id,
        definition_id,
        requestUserId(request),
        parsed.data,
      );
      if (updated === null) {
        throw new NotFoundError('Activation definition not found');
      }
      await publishDefinitionChange(fastify.redis, fastify.log, 'update', definition_id);

      return reply.status(200).send(updated);
    },
  );

  // ── POST /activations/:definition_id/verify ──────────────
  fastify.post(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id/verify',
    async (request: DefinitionRequest, reply: FastifyReply) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const parsed = verifyDefinitionSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const verified = await verifyDefinition(
        fastify.db,
        workspace_id,
        definition_id,
        requestUserId(request),
        parsed.data.confidence,
      );
      if (verified === null) {
        throw new NotFoundError('Activation definition not found');
      }
      await publishDefinitionChange(fastify.redis, fastify.log, 'verify', definition_id);

      return reply.status(200).send(verified);
    },
  );

  // ── DELETE /activations/:definition_id ───────────────────
  fastify.delete(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id',
    async (request: DefinitionRequest, reply: FastifyReply) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const deleted = await removeDefinition(fastify.db, workspace_id, definition_id, requestUserId(request));
      if (!deleted) {
        throw new NotFoundError('Activation definition not found');
      }
      await publishDefinitionChange(fastify.redis, fastify.log, 'delete', definition_id);

      return reply.status(204).send();
    },
  );
}

export default fp(definitionRoutes, {
  name: 'definition-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
