import { and, asc, eq, gte, inArray, lte, type SQL } from 'drizzle-orm';
import type { SubjectEvent } from '../../domain/index.js';
import type { Database } from './client.js';
import { subjectEvents } from './schema.js';

export type SubjectEventRow = typeof subjectEvents.$inferSelect;

export interface SubjectEventFilters {
  subject_ids?: readonly string[];
  from?: string;   // ISO-8601, inclusive
  to?: string;     // ISO-8601, inclusive
}

/** Maps a stored row back to the domain event shape. */
export function toSubjectEvent(row: SubjectEventRow): SubjectEvent {
  return {
    event_id: row.event_id,
    workspace_id: row.workspace_id,
    subject_id: row.subject_id,
    name: row.name,
    occurred_at: row.occurred_at.toISOString(),
    properties: row.properties,
  };
}

/**
 * Inserts a subject event idempotently.
 *
 * Uses ON CONFLICT DO NOTHING on the event_id primary key.
 * Returns true if a row was inserted, false if it was a duplicate.
 */
export async function insertSubjectEvent(db: Database, event: SubjectEvent): Promise<boolean> {
  const rows = await db
    .insert(subjectEvents)
    .values({
      event_id: event.event_id,
      workspace_id: event.workspace_id,
      subject_id: event.subject_id,
      name: event.name,
      occurred_at: new Date(event.occurred_at),
      properties: event.properties,
    })
    .onConflictDoNothing({ target: subjectEvents.event_id })
    .returning({ event_id: subjectEvents.event_id });

  return rows.length > 0;
}

/**
 * Fetches stored events of a workspace in evaluation order:
 * subject, then `occurred_at`, then arrival (`seq`).
 * Only non-undefined filters are applied.
 */
export async function findSubjectEvents(
  db: Database,
  workspaceId: string,
  filters: SubjectEventFilters,
): Promise<SubjectEvent[]> {
  const conditions: SQL[] = [eq(subjectEvents.workspace_id, workspaceId)];

  if (filters.subject_ids !== undefined) {
    conditions.push(inArray(subjectEvents.subject_id, [...filters.subject_ids]));
  }
  if (filters.from !== undefined) {
    conditions.push(gte(subjectEvents.occurred_at, new Date(filters.from)));
  }
  if (filters.to !== undefined) {
    conditions.push(lte(subjectEvents.occurred_at, new Date(filters.to)));
  }

  const rows = await db
    .select()
    .from(subjectEvents)
    .where(and(...conditions))
    .orderBy(asc(subjectEvents.subject_id), asc(subjectEvents.occurred_at), asc(subjectEvents.seq));

  return rows.map(toSubjectEvent);
}
