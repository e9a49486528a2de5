import type { SubjectEvent } from '../../src/domain/index.js';
import { ValidationError } from '../../src/domain/index.js';

let counter = 0;

/** Fixed reference time every fixture is expressed against. */
export const BASE = new Date('2026-03-02T09:00:00.000Z').getTime();

/** ISO timestamp `hours` after BASE. */
export function hoursAfter(hours: number): string {
  return new Date(BASE + hours * 3_600_000).toISOString();
}

/**
 * Factory for subject events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<SubjectEvent> = {}): SubjectEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `evt-${counter}`,
    workspace_id: overrides.workspace_id ?? 'ws-test',
    subject_id: overrides.subject_id ?? 'user-1',
    name: overrides.name ?? 'page_view',
    occurred_at: overrides.occurred_at ?? hoursAfter(0),
    properties: overrides.properties ?? {},
  };
}

/** Shorthand: event `name` for user-1 at BASE + `hours`. */
export function at(name: string, hours: number, eventId?: string): SubjectEvent {
  return makeEvent(eventId === undefined
    ? { name, occurred_at: hoursAfter(hours) }
    : { name, occurred_at: hoursAfter(hours), event_id: eventId });
}

/** Runs `fn` and returns the ValidationError it throws. */
export function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('Expected a ValidationError to be thrown');
}
