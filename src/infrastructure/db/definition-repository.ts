import { randomUUID } from 'node:crypto';
import { and, asc, eq } from 'drizzle-orm';
import type { ActivationRule, ConfidenceLevel } from '../../domain/index.js';
import type { Database } from './client.js';
import { activationDefinitions } from './schema.js';

/** Row shape returned by definition queries. */
export type DefinitionRow = typeof activationDefinitions.$inferSelect;

/** Fields accepted when creating a definition (server assigns id, version and timestamps). */
export interface CreateDefinitionInput {
  workspace_id: string;
  name: string;
  description: string | null;
  rule: ActivationRule;
  confidence: ConfidenceLevel;
  created_by: string;
}

/** Fields accepted for a partial update. `version` is always supplied by the caller. */
export interface UpdateDefinitionInput {
  name?: string;
  description?: string | null;
  rule?: ActivationRule;
  confidence?: ConfidenceLevel;
  last_verified?: Date;
  is_active?: boolean;
  version?: number;
}

export async function insertDefinition(db: Database, input: CreateDefinitionInput): Promise<DefinitionRow> {
  const now = new Date();
  const rows = await db.insert(activationDefinitions).values({
    definition_id: randomUUID(),
    workspace_id: input.workspace_id,
    name: input.name,
    description: input.description,
    rule: input.rule,
    confidence: input.confidence,
    version: 1,
    is_active: true,
    created_by: input.created_by,
    created_at: now,
    updated_at: now,
  }).returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Insert into activation_definitions returned no row');
  }
  return row;
}

/** Active definitions of one workspace, oldest first. */
export async function findDefinitionsByWorkspace(db: Database, workspaceId: string): Promise<DefinitionRow[]> {
  return db
    .select()
    .from(activationDefinitions)
    .where(and(
      eq(activationDefinitions.workspace_id, workspaceId),
      eq(activationDefinitions.is_active, true),
    ))
    .orderBy(asc(activationDefinitions.created_at));
}

/** Every active definition across workspaces (worker snapshot). */
export async function findActiveDefinitions(db: Database): Promise<DefinitionRow[]> {
  return db.select().from(activationDefinitions).where(eq(activationDefinitions.is_active, true));
}

export async function findDefinitionById(
  db: Database,
  workspaceId: string,
  definitionId: string,
): Promise<DefinitionRow | undefined> {
  const rows = await db
    .select()
    .from(activationDefinitions)
    .where(and(
      eq(activationDefinitions.definition_id, definitionId),
      eq(activationDefinitions.workspace_id, workspaceId),
      eq(activationDefinitions.is_active, true),
    ))
    .limit(1);
  return rows[0];
}

/**
 * Applies `input` only while the stored version still equals
 * `expectedVersion`. Returns undefined when no row matched, either because
 * the definition is gone or because another writer got there first.
 */
export async function updateDefinition(
  db: Database,
  workspaceId: string,
  definitionId: string,
  input: UpdateDefinitionInput,
  expectedVersion: number,
): Promise<DefinitionRow | undefined> {
  const rows = await db
    .update(activationDefinitions)
    .set({ ...input, updated_at: new Date() })
    .where(and(
      eq(activationDefinitions.definition_id, definitionId),
      eq(activationDefinitions.workspace_id, workspaceId),
      eq(activationDefinitions.is_active, true),
      eq(activationDefinitions.version, expectedVersion),
    ))
    .returning();
  return rows[0];
}
