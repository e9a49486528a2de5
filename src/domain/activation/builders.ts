import { validateRule } from './validate.js';
import type {
  ActivationRule,
  CompositeOperator,
  CompositeRule,
  SequenceRule,
  SingleEventRule,
} from './types.js';

// Each builder validates what it returns, so a built rule is always evaluable.

export function singleEvent(eventName: string): SingleEventRule {
  const rule: SingleEventRule = { rule_type: 'single_event', event_name: eventName };
  validateRule(rule);
  return rule;
}

export function sequence(events: readonly string[], timeWindowHours: number): SequenceRule {
  const rule: SequenceRule = {
    rule_type: 'sequence',
    events: [...events],
    time_window_hours: timeWindowHours,
  };
  validateRule(rule);
  return rule;
}

export function composite(operator: CompositeOperator, subRules: readonly ActivationRule[]): CompositeRule {
  const rule: CompositeRule = { rule_type: 'composite', operator, sub_rules: [...subRules] };
  validateRule(rule);
  return rule;
}

/** Composite AND. */
export function allOf(...subRules: ActivationRule[]): CompositeRule {
  return composite('AND', subRules);
}

/** Composite OR. */
export function anyOf(...subRules: ActivationRule[]): CompositeRule {
  return composite('OR', subRules);
}
