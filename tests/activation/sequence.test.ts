import { describe, it, expect } from 'vitest';
import { evaluate, sequence } from '../../src/domain/index.js';
import { at, BASE, hoursAfter, makeEvent } from './helpers.js';

describe('sequence rule', () => {
  const onboarding = sequence(['signup', 'create_project', 'invite_teammate'], 72);

  it('activates at the last event when completed inside the window', () => {
    const verdict = evaluate(onboarding, [
      at('signup', 0),
      at('create_project', 10),
      at('invite_teammate', 71),
    ]);
    expect(verdict).toEqual({ activated: true, activated_at: '2026-03-05T08:00:00.000Z' });
  });

  it('is not activated when the last step lands outside the window', () => {
    const verdict = evaluate(onboarding, [
      at('signup', 0),
      at('create_project', 10),
      at('invite_teammate', 73),
    ]);
    expect(verdict).toEqual({ activated: false, activated_at: null });
  });

  it('includes an event exactly at the window boundary', () => {
    const verdict = evaluate(onboarding, [
      at('signup', 0),
      at('create_project', 10),
      at('invite_teammate', 72),
    ]);
    expect(verdict.activated_at).toBe('2026-03-05T09:00:00.000Z');
  });

  it('treats a signup followed by a demo request within 72h as a qualified lead', () => {
    const qualifiedLead = sequence(['signup', 'demo_request'], 72);

    expect(evaluate(qualifiedLead, [at('signup', 0), at('demo_request', 71)]))
      .toEqual({ activated: true, activated_at: '2026-03-05T08:00:00.000Z' });
    expect(evaluate(qualifiedLead, [at('signup', 0), at('demo_request', 73)]))
      .toEqual({ activated: false, activated_at: null });
  });

  it('excludes an event one millisecond past the window', () => {
    const rule = sequence(['A', 'B'], 72);
    const justLate = makeEvent({
      subject_id: 'user-1',
      name: 'B',
      occurred_at: new Date(BASE + 72 * 3_600_000 + 1).toISOString(),
    });

    expect(evaluate(rule, [at('A', 0), justLate])).toEqual({ activated: false, activated_at: null });
  });

  it('requires the steps in order', () => {
    const verdict = evaluate(sequence(['signup', 'create_project'], 24), [
      at('create_project', 0),
      at('signup', 1),
    ]);
    expect(verdict.activated).toBe(false);
  });

  it('skips unrelated events between steps', () => {
    const verdict = evaluate(sequence(['signup', 'create_project'], 24), [
      at('signup', 0),
      at('page_view', 1),
      at('settings_open', 2),
      at('create_project', 3),
    ]);
    expect(verdict.activated_at).toBe(hoursAfter(3));
  });

  it('never counts one event for two steps', () => {
    const twoClicks = sequence(['click', 'click'], 24);
    expect(evaluate(twoClicks, [at('click', 1)]).activated).toBe(false);
    expect(evaluate(twoClicks, [at('click', 1), at('click', 5)]).activated_at).toBe(hoursAfter(5));
  });

  it('needs a distinct event for each repeated step', () => {
    const rule = sequence(['A', 'A', 'B'], 24);
    expect(evaluate(rule, [at('A', 1), at('A', 2), at('B', 3)]).activated_at).toBe(hoursAfter(3));
    expect(evaluate(rule, [at('A', 1), at('B', 2)]).activated).toBe(false);
  });

  it('retries from a later anchor after a window overrun', () => {
    const verdict = evaluate(onboarding, [
      at('signup', 0),
      at('signup', 50),
      at('create_project', 60),
      at('invite_teammate', 100),
    ]);
    expect(verdict).toEqual({ activated: true, activated_at: '2026-03-06T13:00:00.000Z' });
  });

  it('reports the earliest completion', () => {
    const verdict = evaluate(sequence(['signup', 'create_project'], 24), [
      at('signup', 0),
      at('create_project', 2),
      at('signup', 3),
      at('create_project', 4),
    ]);
    expect(verdict.activated_at).toBe(hoursAfter(2));
  });

  it('behaves like single_event with one step', () => {
    const verdict = evaluate(sequence(['signup'], 1), [at('page_view', 0), at('signup', 6)]);
    expect(verdict.activated_at).toBe(hoursAfter(6));
  });

  it('supports fractional windows', () => {
    const halfHour = sequence(['open', 'save'], 0.5);
    expect(evaluate(halfHour, [at('open', 0), at('save', 0.5)]).activated).toBe(true);
    expect(evaluate(halfHour, [at('open', 0), at('save', 0.75)]).activated).toBe(false);
  });

  it('gives the same verdict for unsorted input', () => {
    const signup = at('signup', 0);
    const create = at('create_project', 10);
    const invite = at('invite_teammate', 71);
    expect(evaluate(onboarding, [invite, signup, create])).toEqual(
      evaluate(onboarding, [signup, create, invite]),
    );
  });

  it('breaks timestamp ties by input order', () => {
    const rule = sequence(['signup', 'create_project'], 24);
    const signup = at('signup', 0);
    const create = at('create_project', 0);

    expect(evaluate(rule, [signup, create])).toEqual({ activated: true, activated_at: hoursAfter(0) });
    expect(evaluate(rule, [create, signup])).toEqual({ activated: false, activated_at: null });
  });
});
