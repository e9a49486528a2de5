import type { ActivationDefinition } from '../src/domain/index.js';
import type { DefinitionRow } from '../src/infrastructure/db/index.js';

export const DEFINITION_ID = '11111111-2222-3333-4444-555555555555';

/** Stored row of a 72h onboarding sequence in workspace ws-1. */
export function makeDefinitionRow(overrides: Partial<DefinitionRow> = {}): DefinitionRow {
  return {
    definition_id: DEFINITION_ID,
    workspace_id: 'ws-1',
    name: 'Onboarded',
    description: null,
    rule: { rule_type: 'sequence', events: ['signup', 'create_project'], time_window_hours: 72 },
    confidence: 'high',
    version: 1,
    is_active: true,
    last_verified: null,
    created_by: 'alice',
    created_at: new Date('2026-03-01T12:00:00Z'),
    updated_at: new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}

/** Domain form of `makeDefinitionRow()`. */
export function makeDefinition(overrides: Partial<ActivationDefinition> = {}): ActivationDefinition {
  return {
    definition_id: DEFINITION_ID,
    workspace_id: 'ws-1',
    name: 'Onboarded',
    description: null,
    rule: { rule_type: 'sequence', events: ['signup', 'create_project'], time_window_hours: 72 },
    confidence: 'high',
    version: 1,
    is_active: true,
    last_verified: null,
    created_by: 'alice',
    created_at: '2026-03-01T12:00:00.000Z',
    updated_at: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}
