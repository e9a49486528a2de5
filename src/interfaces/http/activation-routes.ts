import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  previewSchema,
  evaluateDefinitionSchema,
  previewActivation,
  evaluateDefinition,
  getDefinition,
  listActivations,
} from '../../application/index.js';
import { NotFoundError } from '../../domain/index.js';
import { safeInt, UUID_RE } from './request-context.js';

type DefinitionParams = { workspace_id: string; definition_id: string };

/**
 * Activation evaluation routes.
 *
 * POST /api/v1/activations/preview : unsaved rule + events
 * POST /api/v1/workspaces/:workspace_id/activations/:definition_id/evaluate : stored rule + stored history
 * GET  /api/v1/workspaces/:workspace_id/activations/:definition_id/subjects : recorded activations
 */
async function activationRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /activations/preview ────────────────────────────
  fastify.post(
    '/api/v1/activations/preview',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = previewSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const subjectId = parsed.data.subject_id;
      const events = parsed.data.events.map((e) => ({ ...e, subject_id: subjectId }));

      // Throws ValidationError for an invalid rule; mapped to 400 by the error handler.
      const result = previewActivation(parsed.data.rule, events);
      return reply.status(200).send({ subject_id: subjectId, ...result });
    },
  );

  // ── POST /activations/:definition_id/evaluate ────────────
  fastify.post(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id/evaluate',
    async (request: FastifyRequest<{ Params: DefinitionParams; Body: unknown }>, reply: FastifyReply) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const parsed = evaluateDefinitionSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const evaluation = await evaluateDefinition(fastify.db, workspace_id, definition_id, parsed.data);
      if (evaluation === null) {
        throw new NotFoundError('Activation definition not found');
      }

      return reply.status(200).send(evaluation);
    },
  );

  // ── GET /activations/:definition_id/subjects ─────────────
  fastify.get(
    '/api/v1/workspaces/:workspace_id/activations/:definition_id/subjects',
    async (
      request: FastifyRequest<{ Params: DefinitionParams; Querystring: { limit?: string; offset?: string } }>,
      reply: FastifyReply,
    ) => {
      const { workspace_id, definition_id } = request.params;
      if (!UUID_RE.test(definition_id)) {
        return reply.status(400).send({ error: 'definition_id must be a valid UUID' });
      }

      const limit = safeInt(request.query.limit);
      const offset = safeInt(request.query.offset);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const definition = await getDefinition(fastify.db, workspace_id, definition_id);
      if (definition === null) {
        throw new NotFoundError('Activation definition not found');
      }

      const result = await listActivations(fastify.db, definition_id, { limit, offset });
      return reply.status(200).send(result);
    },
  );
}

export default fp(activationRoutes, {
  name: 'activation-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
