import { z } from 'zod';

/**
 * Zod schema for a single inbound subject event.
 *
 * - `event_id` is optional at ingestion; assigned by the handler if absent.
 * - `occurred_at` must be a valid ISO-8601 string.
 * - `properties` is open-ended to support heterogeneous event names.
 */
export const eventSchema = z.object({
  event_id: z.string().uuid().optional(),
  subject_id: z.string().min(1).max(255),
  name: z.string().min(1).max(255),
  occurred_at: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
  properties: z.record(z.string(), z.unknown()).default({}),
});

/** Inferred type representing a validated-but-incomplete event (no guaranteed id). */
export type EventInput = z.infer<typeof eventSchema>;

/**
 * Validates a batch of raw event bodies. The whole batch is rejected
 * on any invalid entry.
 */
export const eventBatchSchema = z.array(eventSchema)
  .min(1, 'Batch must contain at least one event')
  .max(1000, 'Batch must contain at most 1000 events');
