export { subjectEvents, activationDefinitions, subjectActivations, auditLogs } from './schema.js';
export { createDbClient } from './client.js';
export type { Database } from './client.js';
export { insertSubjectEvent, findSubjectEvents, toSubjectEvent } from './event-repository.js';
export type { SubjectEventRow, SubjectEventFilters } from './event-repository.js';
export {
  insertDefinition,
  findDefinitionsByWorkspace,
  findActiveDefinitions,
  findDefinitionById,
  updateDefinition,
} from './definition-repository.js';
export type { DefinitionRow, CreateDefinitionInput, UpdateDefinitionInput } from './definition-repository.js';
export {
  upsertSubjectActivation,
  findRecordedActivations,
  querySubjectActivations,
} from './activation-repository.js';
export type { SubjectActivationRow, NewSubjectActivation, PaginationParams } from './activation-repository.js';
export { insertAuditLog, findAuditLogs, AUDIT_ACTIONS } from './audit-repository.js';
export type { AuditAction, AuditEntry, AuditLogRow, AuditLogFilters } from './audit-repository.js';
export { ensureSchema } from './migrate.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
