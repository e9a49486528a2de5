import type { ActivationDefinition, ActivationRule, ConfidenceLevel } from '../domain/index.js';
import { ConflictError, validateRule } from '../domain/index.js';
import type { Database, DefinitionRow, AuditAction, UpdateDefinitionInput } from '../infrastructure/db/index.js';
import {
  insertDefinition,
  findDefinitionsByWorkspace,
  findDefinitionById,
  updateDefinition as repoUpdate,
  insertAuditLog,
} from '../infrastructure/db/index.js';
import { parseActivationRule } from './activation-schema.js';

const RESOURCE_TYPE = 'activation_definition';

/**
 * Writes `changes` guarded by the version that was read. A miss after a
 * successful read means a concurrent write won.
 */
async function applyChanges(
  db: Database,
  current: ActivationDefinition,
  changes: UpdateDefinitionInput,
): Promise<DefinitionRow> {
  const row = await repoUpdate(db, current.workspace_id, current.definition_id, changes, current.version);
  if (row === undefined) {
    throw new ConflictError('Activation definition was modified concurrently, retry the request');
  }
  return row;
}

export interface CreateDefinitionParams {
  name: string;
  description: string | null;
  rule: ActivationRule;
  confidence: ConfidenceLevel;
}

export interface PatchDefinitionParams {
  name?: string | undefined;
  description?: string | null | undefined;
  rule?: ActivationRule | undefined;
  confidence?: ConfidenceLevel | undefined;
}

function isConfidence(value: string): value is ConfidenceLevel {
  return value === 'high' || value === 'medium' || value === 'low';
}

/**
 * Maps a stored row to the domain definition.
 * The JSONB rule is re-validated; a corrupt row throws ValidationError.
 */
export function toDefinition(row: DefinitionRow): ActivationDefinition {
  return {
    definition_id: row.definition_id,
    workspace_id: row.workspace_id,
    name: row.name,
    description: row.description,
    rule: parseActivationRule(row.rule),
    confidence: isConfidence(row.confidence) ? row.confidence : 'medium',
    version: row.version,
    is_active: row.is_active,
    last_verified: row.last_verified?.toISOString() ?? null,
    created_by: row.created_by,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

async function audit(
  db: Database,
  action: AuditAction,
  userId: string,
  definition: ActivationDefinition,
  oldValue: ActivationDefinition | null,
): Promise<void> {
  await insertAuditLog(db, {
    workspace_id: definition.workspace_id,
    user_id: userId,
    action,
    resource_type: RESOURCE_TYPE,
    resource_id: definition.definition_id,
    old_value: oldValue,
    new_value: definition,
  });
}

/** Create a definition at version 1. The rule is validated before anything is written. */
export async function createDefinition(
  db: Database,
  workspaceId: string,
  userId: string,
  params: CreateDefinitionParams,
): Promise<ActivationDefinition> {
  validateRule(params.rule);

  const row = await insertDefinition(db, {
    workspace_id: workspaceId,
    name: params.name,
    description: params.description,
    rule: params.rule,
    confidence: params.confidence,
    created_by: userId,
  });
  const created = toDefinition(row);

  await audit(db, 'activation_definition_created', userId, created, null);
  return created;
}

/** List active definitions of a workspace. */
export async function listDefinitions(db: Database, workspaceId: string): Promise<ActivationDefinition[]> {
  const rows = await findDefinitionsByWorkspace(db, workspaceId);
  return rows.map(toDefinition);
}

/** Fetch a single active definition. Returns null if not found. */
export async function getDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
): Promise<ActivationDefinition | null> {
  const row = await findDefinitionById(db, workspaceId, definitionId);
  return row === undefined ? null : toDefinition(row);
}

/**
 * Partial update. Every accepted change creates a new version.
 * Returns the updated definition or null if not found; throws
 * ConflictError when a concurrent write bumped the version first.
 */
export async function updateDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
  userId: string,
  params: PatchDefinitionParams,
): Promise<ActivationDefinition | null> {
  if (params.rule !== undefined) {
    validateRule(params.rule);
  }

  const current = await getDefinition(db, workspaceId, definitionId);
  if (current === null) return null;

  const changes: UpdateDefinitionInput = { version: current.version + 1 };
  if (params.name !== undefined) changes.name = params.name;
  if (params.description !== undefined) changes.description = params.description;
  if (params.rule !== undefined) changes.rule = params.rule;
  if (params.confidence !== undefined) changes.confidence = params.confidence;

  const updated = toDefinition(await applyChanges(db, current, changes));
  await audit(db, 'activation_definition_change', userId, updated, current);
  return updated;
}

/**
 * Marks a definition as verified now, optionally re-rating its confidence.
 * The version is unchanged: the rule itself did not change.
 */
export async function verifyDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
  userId: string,
  confidence?: ConfidenceLevel,
): Promise<ActivationDefinition | null> {
  const current = await getDefinition(db, workspaceId, definitionId);
  if (current === null) return null;

  const changes: UpdateDefinitionInput = { last_verified: new Date() };
  if (confidence !== undefined) changes.confidence = confidence;

  const verified = toDefinition(await applyChanges(db, current, changes));
  await audit(db, 'activation_definition_verified', userId, verified, current);
  return verified;
}

/** Soft delete. Returns true if deleted, false if not found. */
export async function removeDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
  userId: string,
): Promise<boolean> {
  const current = await getDefinition(db, workspaceId, definitionId);
  if (current === null) return false;

  const row = await applyChanges(db, current, { is_active: false });
  await audit(db, 'activation_definition_deleted', userId, toDefinition(row), current);
  return true;
}
