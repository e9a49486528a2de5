import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, eventBatchSchema } from '../../application/index.js';
import type { EventInput } from '../../application/index.js';
import { enqueueEvent, WORKER_HEALTH_KEY } from '../../infrastructure/index.js';
import type { SubjectEvent } from '../../domain/index.js';

type WorkspaceParams = { Params: { workspace_id: string }; Body: unknown };

function toSubjectEvent(workspaceId: string, input: EventInput): SubjectEvent {
  return {
    event_id: input.event_id ?? randomUUID(),
    workspace_id: workspaceId,
    subject_id: input.subject_id,
    name: input.name,
    occurred_at: input.occurred_at,
    properties: input.properties,
  };
}

/**
 * Registers the event ingestion routes.
 *
 * POST /api/v1/workspaces/:workspace_id/events : single event
 * POST /api/v1/workspaces/:workspace_id/events/batch : batch (array of events)
 * GET  /api/v1/events/health : Redis + worker check
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Single event ingestion.
   *
   * Validates → assigns event_id if missing → enqueues → returns 202.
   */
  fastify.post(
    '/api/v1/workspaces/:workspace_id/events',
    async (request: FastifyRequest<WorkspaceParams>, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toSubjectEvent(request.params.workspace_id, parsed.data);

      // Fire-and-forget: errors are logged but do not block the response.
      enqueueEvent(fastify.redis, event).catch((err: unknown) => {
        fastify.log.error({ err, event_id: event.event_id }, 'Failed to enqueue event');
      });

      return reply.status(202).send({
        status: 'accepted',
        event_id: event.event_id,
      });
    },
  );

  /**
   * Batch event ingestion.
   *
   * The full array is validated up-front; any invalid entry rejects the
   * whole batch.
   */
  fastify.post(
    '/api/v1/workspaces/:workspace_id/events/batch',
    async (request: FastifyRequest<WorkspaceParams>, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const events = parsed.data.map((input) => toSubjectEvent(request.params.workspace_id, input));

      // Enqueue in arrival order so `seq` preserves the batch order on ties.
      const enqueueAll = async (): Promise<void> => {
        for (const event of events) {
          try {
            await enqueueEvent(fastify.redis, event);
          } catch (err: unknown) {
            fastify.log.error({ err, event_id: event.event_id }, 'Failed to enqueue event');
          }
        }
      };
      void enqueueAll();

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        event_ids: events.map((e) => e.event_id),
      });
    },
  );

  /**
   * Health check: verifies Redis is reachable via PING and reads the
   * worker heartbeat key (set by the worker with a TTL; missing = down).
   */
  fastify.get(
    '/api/v1/events/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let pong: string;
      try {
        pong = await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable', worker: 'unknown' });
      }

      const heartbeat = await fastify.redis.get(WORKER_HEALTH_KEY).catch((err: unknown) => {
        fastify.log.warn({ err }, 'Failed to read worker heartbeat');
        return null;
      });
      const worker = heartbeat === 'ok' ? 'ok' : 'unknown';

      return reply.status(200).send({ status: 'ok', redis: pong, worker });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
