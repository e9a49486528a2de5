export type { SubjectEvent, EventProperties } from './event.js';
export { ActivationError, ValidationError, NotFoundError, ConflictError } from './errors.js';
export type {
  ActivationDefinition,
  ActivationRule,
  ActivationTrace,
  ActivationVerdict,
  CompositeOperator,
  ConfidenceLevel,
  HistoryEvent,
  MatchedEvent,
  RuleType,
} from './activation/index.js';
export {
  validateRule,
  evaluate,
  explain,
  singleEvent,
  sequence,
  composite,
  allOf,
  anyOf,
} from './activation/index.js';
