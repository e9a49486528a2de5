import type { Redis } from 'ioredis';
import type { SubjectEvent } from '../../domain/index.js';

export const STREAM_KEY = 'subject_events_stream';

/**
 * Appends a validated subject event to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). Stream values must
 * be strings, so `properties` is JSON-serialized.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(redis: Redis, event: SubjectEvent): Promise<string> {
  const entryId = await redis.xadd(
    STREAM_KEY,
    '*',
    'event_id', event.event_id,
    'workspace_id', event.workspace_id,
    'subject_id', event.subject_id,
    'name', event.name,
    'occurred_at', event.occurred_at,
    'properties', JSON.stringify(event.properties),
  );

  if (entryId === null) {
    throw new Error(`XADD to ${STREAM_KEY} returned no entry id`);
  }
  return entryId;
}
