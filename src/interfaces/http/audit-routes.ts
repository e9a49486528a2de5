import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listAuditLogs } from '../../application/index.js';
import { AUDIT_ACTIONS } from '../../infrastructure/db/index.js';
import type { AuditAction } from '../../infrastructure/db/index.js';
import { safeInt } from './request-context.js';

type AuditQuery = { resource_id?: string; action?: string; limit?: string; offset?: string };

function isAuditAction(value: string): value is AuditAction {
  return AUDIT_ACTIONS.some((action) => action === value);
}

/**
 * Read-only audit trail of definition changes.
 *
 * GET /api/v1/workspaces/:workspace_id/audit-logs
 *   Query params: resource_id, action, limit (default 100, max 500), offset
 */
async function auditRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/workspaces/:workspace_id/audit-logs',
    async (
      request: FastifyRequest<{ Params: { workspace_id: string }; Querystring: AuditQuery }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      let action: AuditAction | undefined;
      if (q.action !== undefined) {
        if (!isAuditAction(q.action)) {
          return reply.status(400).send({ error: `action must be one of: ${AUDIT_ACTIONS.join(', ')}` });
        }
        action = q.action;
      }

      const result = await listAuditLogs(fastify.db, request.params.workspace_id, {
        resource_id: q.resource_id,
        action,
        limit,
        offset,
      });
      return reply.status(200).send(result);
    },
  );
}

export default fp(auditRoutes, {
  name: 'audit-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
