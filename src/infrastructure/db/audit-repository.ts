import { randomUUID } from 'node:crypto';
import { and, desc, eq, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { auditLogs } from './schema.js';
import type { PaginationParams } from './activation-repository.js';

export const AUDIT_ACTIONS = [
  'activation_definition_created',
  'activation_definition_change',
  'activation_definition_verified',
  'activation_definition_deleted',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditLogRow = typeof auditLogs.$inferSelect;

export interface AuditLogFilters {
  resource_id?: string | undefined;
  action?: AuditAction | undefined;
}

export interface AuditEntry {
  workspace_id: string;
  user_id: string;
  action: AuditAction;
  resource_type: string;
  resource_id: string;
  old_value?: unknown;
  new_value?: unknown;
}

/**
 * Appends an audit log entry.
 * Generates a UUID for log_id and returns it.
 */
export async function insertAuditLog(db: Database, entry: AuditEntry): Promise<string> {
  const logId = randomUUID();
  await db.insert(auditLogs).values({
    log_id: logId,
    workspace_id: entry.workspace_id,
    user_id: entry.user_id,
    action: entry.action,
    resource_type: entry.resource_type,
    resource_id: entry.resource_id,
    old_value: entry.old_value ?? null,
    new_value: entry.new_value ?? null,
  });
  return logId;
}

/** Audit entries of one workspace, newest first. */
export async function findAuditLogs(
  db: Database,
  workspaceId: string,
  filters: AuditLogFilters,
  pagination: PaginationParams,
): Promise<AuditLogRow[]> {
  const conditions: SQL[] = [eq(auditLogs.workspace_id, workspaceId)];
  if (filters.resource_id !== undefined) conditions.push(eq(auditLogs.resource_id, filters.resource_id));
  if (filters.action !== undefined) conditions.push(eq(auditLogs.action, filters.action));

  return db
    .select()
    .from(auditLogs)
    .where(and(...conditions))
    .orderBy(desc(auditLogs.created_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}
