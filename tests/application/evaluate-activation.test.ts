import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  findDefinitionById: vi.fn(),
  findSubjectEvents: vi.fn(),
  querySubjectActivations: vi.fn(),
}));

import {
  evaluateDefinition,
  previewActivation,
  listActivations,
  groupBySubject,
} from '../../src/application/evaluate-activation.js';
import {
  findDefinitionById,
  findSubjectEvents,
  querySubjectActivations,
} from '../../src/infrastructure/db/index.js';
import { makeEvent, hoursAfter, validationErrorOf } from '../activation/helpers.js';
import { DEFINITION_ID, makeDefinitionRow } from '../fixtures.js';

const mockFindById = vi.mocked(findDefinitionById);
const mockFindSubjectEvents = vi.mocked(findSubjectEvents);
const mockQueryActivations = vi.mocked(querySubjectActivations);

const db = {} as Parameters<typeof evaluateDefinition>[0];

beforeEach(() => {
  vi.clearAllMocks();
});

// ─── evaluateDefinition ──────────────────────────────────────

describe('evaluateDefinition', () => {
  const aliceSignup = makeEvent({ subject_id: 'alice', name: 'signup', occurred_at: hoursAfter(0) });
  const aliceProject = makeEvent({ subject_id: 'alice', name: 'create_project', occurred_at: hoursAfter(5) });
  const bobSignup = makeEvent({ subject_id: 'bob', name: 'signup', occurred_at: hoursAfter(1) });

  it('returns null when the definition does not exist', async () => {
    mockFindById.mockResolvedValue(undefined);

    expect(await evaluateDefinition(db, 'ws-1', DEFINITION_ID, {})).toBeNull();
    expect(mockFindSubjectEvents).not.toHaveBeenCalled();
  });

  it('evaluates every subject with events in range', async () => {
    mockFindById.mockResolvedValue(makeDefinitionRow());
    mockFindSubjectEvents.mockResolvedValue([aliceSignup, aliceProject, bobSignup]);

    const result = await evaluateDefinition(db, 'ws-1', DEFINITION_ID, { from: hoursAfter(-24) });

    expect(mockFindSubjectEvents).toHaveBeenCalledWith(db, 'ws-1', { from: hoursAfter(-24) });
    expect(result).toEqual({
      definition: {
        definition_id: DEFINITION_ID,
        name: 'Onboarded',
        version: 1,
        confidence: 'high',
        last_verified: null,
      },
      results: [
        { subject_id: 'alice', activated: true, activated_at: hoursAfter(5) },
        { subject_id: 'bob', activated: false, activated_at: null },
      ],
      summary: { evaluated: 2, activated: 1 },
    });
  });

  it('reports named subjects without events as not activated', async () => {
    mockFindById.mockResolvedValue(makeDefinitionRow());
    mockFindSubjectEvents.mockResolvedValue([aliceSignup, aliceProject]);

    const result = await evaluateDefinition(db, 'ws-1', DEFINITION_ID, { subject_ids: ['carol', 'alice'] });

    expect(mockFindSubjectEvents).toHaveBeenCalledWith(db, 'ws-1', { subject_ids: ['carol', 'alice'] });
    expect(result?.results).toEqual([
      { subject_id: 'carol', activated: false, activated_at: null },
      { subject_id: 'alice', activated: true, activated_at: hoursAfter(5) },
    ]);
  });

  it('evaluates a subject named twice only once', async () => {
    mockFindById.mockResolvedValue(makeDefinitionRow());
    mockFindSubjectEvents.mockResolvedValue([aliceSignup, aliceProject]);

    const result = await evaluateDefinition(db, 'ws-1', DEFINITION_ID, { subject_ids: ['alice', 'alice'] });

    expect(mockFindSubjectEvents).toHaveBeenCalledWith(db, 'ws-1', { subject_ids: ['alice'] });
    expect(result?.results).toEqual([
      { subject_id: 'alice', activated: true, activated_at: hoursAfter(5) },
    ]);
    expect(result?.summary).toEqual({ evaluated: 1, activated: 1 });
  });
});

// ─── previewActivation ───────────────────────────────────────

describe('previewActivation', () => {
  it('returns the verdict with its trace', () => {
    const result = previewActivation(
      { rule_type: 'single_event', event_name: 'signup' },
      [{ subject_id: 'preview', name: 'signup', occurred_at: '2026-03-02T09:00:00Z' }],
    );

    expect(result.verdict).toEqual({ activated: true, activated_at: '2026-03-02T09:00:00.000Z' });
    expect(result.trace.matched).toEqual([
      { event_id: null, name: 'signup', occurred_at: '2026-03-02T09:00:00Z' },
    ]);
  });

  it('rejects a malformed rule', () => {
    const error = validationErrorOf(() =>
      previewActivation({ rule_type: 'sequence', events: ['signup'], time_window_hours: '24' }, []),
    );
    expect(error.field).toBe('rule.time_window_hours');
  });
});

// ─── listActivations ─────────────────────────────────────────

describe('listActivations', () => {
  const row = {
    definition_id: DEFINITION_ID,
    subject_id: 'alice',
    workspace_id: 'ws-1',
    definition_version: 1,
    activated_at: new Date('2026-03-02T14:00:00Z'),
    recorded_at: new Date('2026-03-02T14:00:01Z'),
  };

  it('defaults to 50 rows from offset 0', async () => {
    mockQueryActivations.mockResolvedValue([row]);

    const result = await listActivations(db, DEFINITION_ID, {});

    expect(mockQueryActivations).toHaveBeenCalledWith(db, DEFINITION_ID, { limit: 50, offset: 0 });
    expect(result).toEqual({ data: [row], pagination: { limit: 50, offset: 0, count: 1 } });
  });

  it('clamps limit and offset', async () => {
    mockQueryActivations.mockResolvedValue([]);

    await listActivations(db, DEFINITION_ID, { limit: 10_000, offset: -5 });
    expect(mockQueryActivations).toHaveBeenLastCalledWith(db, DEFINITION_ID, { limit: 500, offset: 0 });

    await listActivations(db, DEFINITION_ID, { limit: 0, offset: 20 });
    expect(mockQueryActivations).toHaveBeenLastCalledWith(db, DEFINITION_ID, { limit: 1, offset: 20 });
  });
});

// ─── groupBySubject ──────────────────────────────────────────

describe('groupBySubject', () => {
  it('keeps first-seen subject order and per-subject event order', () => {
    const a1 = makeEvent({ subject_id: 'a' });
    const b1 = makeEvent({ subject_id: 'b' });
    const a2 = makeEvent({ subject_id: 'a' });

    const groups = groupBySubject([a1, b1, a2]);

    expect([...groups.keys()]).toEqual(['a', 'b']);
    expect(groups.get('a')).toEqual([a1, a2]);
    expect(groups.get('b')).toEqual([b1]);
  });
});
