import type { AuditAction, AuditLogFilters, AuditLogRow, Database } from '../infrastructure/db/index.js';
import { findAuditLogs } from '../infrastructure/db/index.js';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

export interface ListAuditLogsParams {
  resource_id?: string | undefined;
  action?: AuditAction | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
}

/**
 * Use case: a workspace's audit trail, newest first, optionally narrowed
 * to one definition or one action. Clamps limit to [1, 500], defaults to 100.
 */
export async function listAuditLogs(
  db: Database,
  workspaceId: string,
  params: ListAuditLogsParams,
): Promise<{ data: AuditLogRow[]; pagination: { limit: number; offset: number; count: number } }> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: AuditLogFilters = {};
  if (params.resource_id !== undefined) filters.resource_id = params.resource_id;
  if (params.action !== undefined) filters.action = params.action;

  const data = await findAuditLogs(db, workspaceId, filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}
