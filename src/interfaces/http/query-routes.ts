import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getSubjectHistory } from '../../application/index.js';
import { isValidIso } from './request-context.js';

/**
 * Read-only history route.
 *
 * GET /api/v1/workspaces/:workspace_id/subjects/:subject_id/events
 *   Query params: from, to (ISO-8601, inclusive)
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/workspaces/:workspace_id/subjects/:subject_id/events',
    async (
      request: FastifyRequest<{
        Params: { workspace_id: string; subject_id: string };
        Querystring: { from?: string; to?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      if (q.from !== undefined && !isValidIso(q.from)) {
        return reply.status(400).send({ error: 'from must be a valid ISO-8601 timestamp' });
      }
      if (q.to !== undefined && !isValidIso(q.to)) {
        return reply.status(400).send({ error: 'to must be a valid ISO-8601 timestamp' });
      }
      if (q.from !== undefined && q.to !== undefined && Date.parse(q.from) > Date.parse(q.to)) {
        return reply.status(400).send({ error: 'from must not be after to' });
      }

      const { workspace_id, subject_id } = request.params;
      const data = await getSubjectHistory(fastify.db, workspace_id, subject_id, {
        from: q.from,
        to: q.to,
      });

      return reply.status(200).send({ subject_id, count: data.length, data });
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
