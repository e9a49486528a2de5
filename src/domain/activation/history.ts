import type { SubjectEvent } from '../event.js';
import { ValidationError } from '../errors.js';

/**
 * The slice of an event the evaluator reads. Stored events satisfy it;
 * ad-hoc previews may omit `event_id`.
 */
export type HistoryEvent =
  Pick<SubjectEvent, 'subject_id' | 'name' | 'occurred_at'> & { readonly event_id?: string };

/** An event with its parsed timestamp (epoch ms). */
export interface TimedEvent {
  readonly event: HistoryEvent;
  readonly at: number;
}

/**
 * Parses and orders one subject's history.
 *
 * Input is re-sorted by `occurred_at` with a stable sort, so the caller's
 * order only decides ties (arrival order). The input array is not mutated.
 * Throws ValidationError for an unparseable timestamp or a slice that
 * mixes subjects.
 */
export function prepareHistory(events: readonly HistoryEvent[]): TimedEvent[] {
  const first = events[0];
  const timed: TimedEvent[] = events.map((event, i) => {
    const at = Date.parse(event.occurred_at);
    if (Number.isNaN(at)) {
      throw new ValidationError(`Unparseable timestamp: "${event.occurred_at}"`, `events[${i}].occurred_at`);
    }
    if (first !== undefined && event.subject_id !== first.subject_id) {
      throw new ValidationError(
        `History mixes subjects "${first.subject_id}" and "${event.subject_id}"`,
        'events',
      );
    }
    return { event, at };
  });

  return timed.sort((a, b) => a.at - b.at);
}
