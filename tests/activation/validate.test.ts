import { describe, it, expect } from 'vitest';
import { validateRule, ActivationError, ValidationError } from '../../src/domain/index.js';
import type { ActivationRule } from '../../src/domain/index.js';
import { validationErrorOf } from './helpers.js';

describe('validateRule', () => {
  it('accepts a well-formed nested tree', () => {
    const rule: ActivationRule = {
      rule_type: 'composite',
      operator: 'AND',
      sub_rules: [
        { rule_type: 'single_event', event_name: 'signup' },
        {
          rule_type: 'composite',
          operator: 'OR',
          sub_rules: [
            { rule_type: 'sequence', events: ['create_project', 'invite_teammate'], time_window_hours: 48 },
            { rule_type: 'single_event', event_name: 'import_data' },
          ],
        },
      ],
    };
    expect(() => validateRule(rule)).not.toThrow();
  });

  it('rejects a blank event_name', () => {
    const error = validationErrorOf(() => validateRule({ rule_type: 'single_event', event_name: '  ' }));
    expect(error.field).toBe('rule.event_name');
    expect(error.message).toBe('event_name must be a non-empty string');
  });

  it('rejects an empty sequence', () => {
    const error = validationErrorOf(() =>
      validateRule({ rule_type: 'sequence', events: [], time_window_hours: 24 }),
    );
    expect(error.field).toBe('rule.events');
  });

  it('rejects a blank step inside a sequence', () => {
    const error = validationErrorOf(() =>
      validateRule({ rule_type: 'sequence', events: ['signup', ''], time_window_hours: 24 }),
    );
    expect(error.field).toBe('rule.events[1]');
  });

  it.each([0, -3, Number.NaN, Number.POSITIVE_INFINITY])('rejects time_window_hours = %s', (hours) => {
    const error = validationErrorOf(() =>
      validateRule({ rule_type: 'sequence', events: ['signup'], time_window_hours: hours }),
    );
    expect(error.field).toBe('rule.time_window_hours');
    expect(error.message).toBe('time_window_hours must be a positive number');
  });

  it('rejects a composite without sub_rules', () => {
    const error = validationErrorOf(() =>
      validateRule({ rule_type: 'composite', operator: 'OR', sub_rules: [] }),
    );
    expect(error.field).toBe('rule.sub_rules');
  });

  it('names the nested path of the first offending field', () => {
    const error = validationErrorOf(() =>
      validateRule({
        rule_type: 'composite',
        operator: 'AND',
        sub_rules: [
          { rule_type: 'single_event', event_name: 'signup' },
          {
            rule_type: 'composite',
            operator: 'OR',
            sub_rules: [{ rule_type: 'sequence', events: ['a'], time_window_hours: 0 }],
          },
        ],
      }),
    );
    expect(error.field).toBe('rule.sub_rules[1].sub_rules[0].time_window_hours');
  });

  it('uses the given root path', () => {
    const error = validationErrorOf(() =>
      validateRule({ rule_type: 'single_event', event_name: '' }, 'definition.rule'),
    );
    expect(error.field).toBe('definition.rule.event_name');
  });

  it('throws an ActivationError with code and status', () => {
    const error = validationErrorOf(() => validateRule({ rule_type: 'single_event', event_name: '' }));
    expect(error).toBeInstanceOf(ActivationError);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.statusCode).toBe(400);
  });
});
