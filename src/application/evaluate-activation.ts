import type {
  ActivationDefinition,
  ActivationTrace,
  ActivationVerdict,
  HistoryEvent,
  SubjectEvent,
} from '../domain/index.js';
import { evaluate, explain } from '../domain/index.js';
import type { Database, SubjectActivationRow, SubjectEventFilters } from '../infrastructure/db/index.js';
import { findSubjectEvents, querySubjectActivations } from '../infrastructure/db/index.js';
import { getDefinition } from './definition-crud.js';
import { parseActivationRule } from './activation-schema.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface EvaluateDefinitionParams {
  subject_ids?: readonly string[] | undefined;
  from?: string | undefined;
  to?: string | undefined;
}

export type SubjectVerdict = { readonly subject_id: string } & ActivationVerdict;

export interface DefinitionEvaluation {
  definition: Pick<ActivationDefinition, 'definition_id' | 'name' | 'version' | 'confidence' | 'last_verified'>;
  results: SubjectVerdict[];
  summary: { evaluated: number; activated: number };
}

/** Splits a history ordered by subject into per-subject slices, keeping order. */
export function groupBySubject(events: readonly SubjectEvent[]): Map<string, SubjectEvent[]> {
  const groups = new Map<string, SubjectEvent[]>();
  for (const event of events) {
    const group = groups.get(event.subject_id);
    if (group === undefined) {
      groups.set(event.subject_id, [event]);
    } else {
      group.push(event);
    }
  }
  return groups;
}

/**
 * Use case: evaluate a stored definition against stored history.
 *
 * Subjects named in `subject_ids` without any event in range still get a
 * (not activated) verdict; a subject named twice is evaluated once. Without `subject_ids`, every subject with an
 * event in range is evaluated. Returns null if the definition is not found.
 */
export async function evaluateDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
  params: EvaluateDefinitionParams,
): Promise<DefinitionEvaluation | null> {
  const definition = await getDefinition(db, workspaceId, definitionId);
  if (definition === null) return null;

  const named = params.subject_ids === undefined ? undefined : [...new Set(params.subject_ids)];

  const filters: SubjectEventFilters = {};
  if (named !== undefined) filters.subject_ids = named;
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  const events = await findSubjectEvents(db, workspaceId, filters);
  const bySubject = groupBySubject(events);
  const subjectIds = named ?? [...bySubject.keys()];

  const results: SubjectVerdict[] = subjectIds.map((subjectId) => ({
    subject_id: subjectId,
    ...evaluate(definition.rule, bySubject.get(subjectId) ?? []),
  }));

  return {
    definition: {
      definition_id: definition.definition_id,
      name: definition.name,
      version: definition.version,
      confidence: definition.confidence,
      last_verified: definition.last_verified,
    },
    results,
    summary: {
      evaluated: results.length,
      activated: results.filter((r) => r.activated).length,
    },
  };
}

export interface PreviewResult {
  verdict: ActivationVerdict;
  trace: ActivationTrace;
}

/**
 * Use case: evaluate an unsaved rule against events supplied by the caller.
 * Throws ValidationError for an invalid rule or event slice.
 */
export function previewActivation(rawRule: unknown, events: readonly HistoryEvent[]): PreviewResult {
  const rule = parseActivationRule(rawRule);
  const trace = explain(rule, events);
  const verdict: ActivationVerdict = trace.activated
    ? { activated: true, activated_at: trace.activated_at }
    : { activated: false, activated_at: null };
  return { verdict, trace };
}

export interface ListActivationsParams {
  limit?: number | undefined;
  offset?: number | undefined;
}

/**
 * Use case: list recorded activations of a definition, newest first.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listActivations(
  db: Database,
  definitionId: string,
  params: ListActivationsParams,
): Promise<{ data: SubjectActivationRow[]; pagination: { limit: number; offset: number; count: number } }> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const data = await querySubjectActivations(db, definitionId, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}
