import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

export const ACTIVATIONS_CHANNEL = 'subject_activated';

export interface ActivationNotificationPayload {
  definition_id: string;
  definition_version: number;
  workspace_id: string;
  subject_id: string;
  activated_at: string;
}

/**
 * Publishes a newly recorded activation for downstream consumers
 * (dashboards, CRM sync).
 *
 * Best-effort: failures are logged, never thrown.
 */
export async function publishActivation(
  redis: Redis,
  log: Logger,
  payload: ActivationNotificationPayload,
): Promise<void> {
  try {
    await redis.publish(ACTIVATIONS_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: ACTIVATIONS_CHANNEL, ...payload }, 'Published activation notification');
  } catch (err: unknown) {
    log.error({ err, definition_id: payload.definition_id, subject_id: payload.subject_id }, 'Failed to publish activation notification');
  }
}
