export { eventSchema, eventBatchSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export {
  activationRuleSchema,
  confidenceSchema,
  parseActivationRule,
  createDefinitionSchema,
  patchDefinitionSchema,
  verifyDefinitionSchema,
  evaluateDefinitionSchema,
  previewSchema,
} from './activation-schema.js';
export {
  createDefinition,
  listDefinitions,
  getDefinition,
  updateDefinition,
  verifyDefinition,
  removeDefinition,
  toDefinition,
} from './definition-crud.js';
export { DefinitionStore } from './definition-store.js';
export { recordActivations } from './record-activations.js';
export type { RecordActivationsResult, ActivationFailure } from './record-activations.js';
export {
  evaluateDefinition,
  previewActivation,
  listActivations,
  groupBySubject,
} from './evaluate-activation.js';
export type { DefinitionEvaluation, SubjectVerdict, PreviewResult } from './evaluate-activation.js';
export { getSubjectHistory } from './query-events.js';
export { listAuditLogs } from './query-audit-logs.js';
export type { ListAuditLogsParams } from './query-audit-logs.js';
