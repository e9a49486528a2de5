import type { ActivationDefinition, ActivationVerdict, SubjectEvent } from '../domain/index.js';
import { evaluate } from '../domain/index.js';
import type { Database, NewSubjectActivation } from '../infrastructure/db/index.js';
import {
  findRecordedActivations,
  findSubjectEvents,
  upsertSubjectActivation,
} from '../infrastructure/db/index.js';

const MS_PER_DAY = 86_400_000;

/** A definition that could not be evaluated for the subject. */
export interface ActivationFailure {
  readonly definition_id: string;
  readonly error: unknown;
}

export interface RecordActivationsResult {
  readonly recorded: NewSubjectActivation[];
  readonly failures: ActivationFailure[];
}

function tryEvaluate(
  definition: ActivationDefinition,
  history: readonly SubjectEvent[],
): ActivationVerdict | { readonly error: unknown } {
  try {
    return evaluate(definition.rule, history);
  } catch (error: unknown) {
    return { error };
  }
}

/**
 * Use case: after a new event is stored, record activation transitions.
 *
 * Candidates are the active definitions of the event's workspace that the
 * subject has not activated yet, plus those whose recorded activation is
 * later than the event (a late event may move the activation earlier).
 * For each candidate:
 * 1. Load the subject's history, bounded to `lookbackDays` before the event.
 * 2. Evaluate the rule.
 * 3. Upsert the activation when it is new or earlier than the recorded one.
 *
 * A definition that fails to evaluate is reported in `failures` and does
 * not stop the others. Repository errors propagate.
 */
export async function recordActivations(
  db: Database,
  event: SubjectEvent,
  definitions: readonly ActivationDefinition[],
  lookbackDays: number,
): Promise<RecordActivationsResult> {
  const candidates = definitions.filter(
    (d) => d.is_active && d.workspace_id === event.workspace_id,
  );
  if (candidates.length === 0) return { recorded: [], failures: [] };

  const eventTime = new Date(event.occurred_at).getTime();
  const recordedAt = await findRecordedActivations(
    db,
    event.subject_id,
    candidates.map((d) => d.definition_id),
  );
  const pending = candidates.filter((d) => {
    const previous = recordedAt.get(d.definition_id);
    return previous === undefined || eventTime < Date.parse(previous);
  });
  if (pending.length === 0) return { recorded: [], failures: [] };

  const history = await findSubjectEvents(db, event.workspace_id, {
    subject_ids: [event.subject_id],
    from: new Date(eventTime - lookbackDays * MS_PER_DAY).toISOString(),
  });

  const recorded: NewSubjectActivation[] = [];
  const failures: ActivationFailure[] = [];

  for (const definition of pending) {
    const verdict = tryEvaluate(definition, history);
    if ('error' in verdict) {
      failures.push({ definition_id: definition.definition_id, error: verdict.error });
      continue;
    }
    if (!verdict.activated) continue;

    const previous = recordedAt.get(definition.definition_id);
    if (previous !== undefined && Date.parse(verdict.activated_at) >= Date.parse(previous)) continue;

    const activation: NewSubjectActivation = {
      definition_id: definition.definition_id,
      workspace_id: definition.workspace_id,
      subject_id: event.subject_id,
      definition_version: definition.version,
      activated_at: verdict.activated_at,
    };
    if (await upsertSubjectActivation(db, activation)) {
      recorded.push(activation);
    }
  }

  return { recorded, failures };
}
