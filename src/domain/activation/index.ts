export type {
  ActivationDefinition,
  ActivationRule,
  ActivationTrace,
  ActivationVerdict,
  CompositeOperator,
  CompositeRule,
  ConfidenceLevel,
  MatchedEvent,
  RuleType,
  SequenceRule,
  SingleEventRule,
} from './types.js';
export type { HistoryEvent, TimedEvent } from './history.js';
export { prepareHistory } from './history.js';
export { validateRule } from './validate.js';
export { singleEvent, sequence, composite, allOf, anyOf } from './builders.js';
export { evaluate, explain } from './evaluate.js';
