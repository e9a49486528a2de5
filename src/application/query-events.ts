import type { SubjectEvent } from '../domain/index.js';
import type { Database, SubjectEventFilters } from '../infrastructure/db/index.js';
import { findSubjectEvents } from '../infrastructure/db/index.js';

export interface SubjectHistoryParams {
  from?: string | undefined;
  to?: string | undefined;
}

/**
 * Use case: one subject's stored history in evaluation order
 * (`occurred_at`, then arrival).
 */
export async function getSubjectHistory(
  db: Database,
  workspaceId: string,
  subjectId: string,
  params: SubjectHistoryParams,
): Promise<SubjectEvent[]> {
  const filters: SubjectEventFilters = { subject_ids: [subjectId] };
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  return findSubjectEvents(db, workspaceId, filters);
}
