import { describe, it, expect } from 'vitest';
import { evaluate, sequence, singleEvent } from '../../src/domain/index.js';
import type { HistoryEvent } from '../../src/domain/index.js';
import { at, makeEvent, validationErrorOf } from './helpers.js';

describe('evaluate', () => {
  const rule = sequence(['signup', 'create_project'], 24);

  it('validates the rule before reading the history', () => {
    const history: HistoryEvent[] = [{ subject_id: 'user-1', name: 'signup', occurred_at: 'not a date' }];
    const error = validationErrorOf(() =>
      evaluate({ rule_type: 'sequence', events: [], time_window_hours: 1 }, history),
    );
    expect(error.field).toBe('rule.events');
  });

  it('rejects an unparseable timestamp with its index', () => {
    const error = validationErrorOf(() =>
      evaluate(rule, [at('signup', 0), { subject_id: 'user-1', name: 'create_project', occurred_at: 'yesterday' }]),
    );
    expect(error.field).toBe('events[1].occurred_at');
    expect(error.message).toBe('Unparseable timestamp: "yesterday"');
  });

  it('rejects a history mixing subjects', () => {
    const error = validationErrorOf(() =>
      evaluate(rule, [at('signup', 0), makeEvent({ subject_id: 'user-2', name: 'create_project' })]),
    );
    expect(error.field).toBe('events');
    expect(error.message).toBe('History mixes subjects "user-1" and "user-2"');
  });

  it('does not reorder the caller\'s array', () => {
    const later = at('create_project', 3);
    const earlier = at('signup', 1);
    const history = [later, earlier];

    evaluate(rule, history);

    expect(history).toEqual([later, earlier]);
  });

  it('returns the same verdict on repeated calls', () => {
    const history = [at('signup', 0), at('create_project', 5)];
    const first = evaluate(rule, history);
    const second = evaluate(rule, history);
    expect(second).toEqual(first);
    expect(first).toEqual({ activated: true, activated_at: '2026-03-02T14:00:00.000Z' });
  });

  it('ignores extra fields on stored events', () => {
    const history = [makeEvent({ name: 'signup', properties: { plan: 'pro' } })];
    expect(evaluate(singleEvent('signup'), history).activated).toBe(true);
  });
});
