import type { ActivationDefinition } from '../domain/index.js';

/**
 * Atomic-swap holder for the worker's snapshot of active definitions.
 *
 * The consumer reads on every event; the change subscriber replaces the
 * snapshot after a reload. Both sides are synchronous, so a reader always
 * sees a complete snapshot, either the old one or the new one.
 */
export class DefinitionStore {
  private definitions: readonly ActivationDefinition[];

  constructor(initial: readonly ActivationDefinition[] = []) {
    this.definitions = initial;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly ActivationDefinition[] {
    return this.definitions;
  }

  /** Active definitions of one workspace. */
  forWorkspace(workspaceId: string): ActivationDefinition[] {
    return this.definitions.filter((d) => d.workspace_id === workspaceId && d.is_active);
  }

  /** Atomically replaces the snapshot. */
  set(next: readonly ActivationDefinition[]): void {
    this.definitions = next;
  }
}
