import { ValidationError } from '../errors.js';
import type { ActivationRule } from './types.js';

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

/**
 * Rejects structurally invalid rules.
 *
 * Walks the whole tree and throws a ValidationError naming the first
 * offending field, e.g. `rule.sub_rules[1].time_window_hours`. Never
 * repairs the rule.
 */
export function validateRule(rule: ActivationRule, path: string = 'rule'): void {
  switch (rule.rule_type) {
    case 'single_event': {
      if (typeof rule.event_name !== 'string' || isBlank(rule.event_name)) {
        throw new ValidationError('event_name must be a non-empty string', `${path}.event_name`);
      }
      return;
    }

    case 'sequence': {
      if (!Array.isArray(rule.events) || rule.events.length === 0) {
        throw new ValidationError('events must contain at least one event name', `${path}.events`);
      }
      rule.events.forEach((name, i) => {
        if (typeof name !== 'string' || isBlank(name)) {
          throw new ValidationError('event names must be non-empty strings', `${path}.events[${i}]`);
        }
      });
      if (!Number.isFinite(rule.time_window_hours) || rule.time_window_hours <= 0) {
        throw new ValidationError('time_window_hours must be a positive number', `${path}.time_window_hours`);
      }
      return;
    }

    case 'composite': {
      if (rule.operator !== 'AND' && rule.operator !== 'OR') {
        throw new ValidationError('operator must be AND or OR', `${path}.operator`);
      }
      if (!Array.isArray(rule.sub_rules) || rule.sub_rules.length === 0) {
        throw new ValidationError('sub_rules must contain at least one rule', `${path}.sub_rules`);
      }
      rule.sub_rules.forEach((child, i) => validateRule(child, `${path}.sub_rules[${i}]`));
      return;
    }

    default: {
      const unsupported: never = rule;
      void unsupported;
      throw new ValidationError('Unsupported rule_type', `${path}.rule_type`);
    }
  }
}
