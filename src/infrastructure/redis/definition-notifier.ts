import type { Redis } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';

export const DEFINITIONS_CHANNEL = 'activation_definitions_changed';

export type DefinitionChangeReason = 'create' | 'update' | 'verify' | 'delete';

export interface DefinitionChangePayload {
  ts: string;
  reason: DefinitionChangeReason;
  definition_id: string;
}

/**
 * Publishes a lightweight notification to the definitions Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated, so
 * definition CRUD responses are never affected by Pub/Sub issues.
 */
export async function publishDefinitionChange(
  redis: Redis,
  log: FastifyBaseLogger,
  reason: DefinitionChangeReason,
  definitionId: string,
): Promise<void> {
  try {
    const payload: DefinitionChangePayload = {
      ts: new Date().toISOString(),
      reason,
      definition_id: definitionId,
    };
    await redis.publish(DEFINITIONS_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: DEFINITIONS_CHANNEL, reason, definition_id: definitionId }, 'Published definition change notification');
  } catch (err: unknown) {
    log.error({ err, reason, definition_id: definitionId }, 'Failed to publish definition change notification');
  }
}
