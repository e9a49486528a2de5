import { and, desc, eq, inArray, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { subjectActivations } from './schema.js';

export type SubjectActivationRow = typeof subjectActivations.$inferSelect;

export interface NewSubjectActivation {
  definition_id: string;
  workspace_id: string;
  subject_id: string;
  definition_version: number;
  activated_at: string; // ISO-8601
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Records a subject's activation for a definition, keeping the earliest.
 *
 * Upsert on (definition_id, subject_id): a new row is inserted, and an
 * existing row is only overwritten when the new `activated_at` is
 * strictly earlier (a late event moved the activation back in time).
 * Returns true if a row was inserted or corrected.
 */
export async function upsertSubjectActivation(db: Database, activation: NewSubjectActivation): Promise<boolean> {
  const rows = await db
    .insert(subjectActivations)
    .values({
      definition_id: activation.definition_id,
      workspace_id: activation.workspace_id,
      subject_id: activation.subject_id,
      definition_version: activation.definition_version,
      activated_at: new Date(activation.activated_at),
    })
    .onConflictDoUpdate({
      target: [subjectActivations.definition_id, subjectActivations.subject_id],
      set: {
        activated_at: sql`excluded.activated_at`,
        definition_version: sql`excluded.definition_version`,
        recorded_at: new Date(),
      },
      setWhere: sql`excluded.activated_at < ${subjectActivations.activated_at}`,
    })
    .returning({ definition_id: subjectActivations.definition_id });

  return rows.length > 0;
}

/**
 * Stored activation times (ISO-8601) of `definitionIds` for the subject,
 * keyed by definition id. Definitions without an activation are absent.
 */
export async function findRecordedActivations(
  db: Database,
  subjectId: string,
  definitionIds: readonly string[],
): Promise<Map<string, string>> {
  if (definitionIds.length === 0) return new Map();

  const rows = await db
    .select({ definition_id: subjectActivations.definition_id, activated_at: subjectActivations.activated_at })
    .from(subjectActivations)
    .where(and(
      eq(subjectActivations.subject_id, subjectId),
      inArray(subjectActivations.definition_id, [...definitionIds]),
    ));

  return new Map(rows.map((row) => [row.definition_id, row.activated_at.toISOString()]));
}

/** Recorded activations of one definition, newest first. */
export async function querySubjectActivations(
  db: Database,
  definitionId: string,
  pagination: PaginationParams,
): Promise<SubjectActivationRow[]> {
  return db
    .select()
    .from(subjectActivations)
    .where(eq(subjectActivations.definition_id, definitionId))
    .orderBy(desc(subjectActivations.activated_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}
