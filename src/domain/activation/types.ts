/** Boolean combinator for composite rules. */
export type CompositeOperator = 'AND' | 'OR';

/** How much the workspace trusts a definition to reflect real activation. */
export type ConfidenceLevel = 'high' | 'medium' | 'low';

/** Activated at the first occurrence of `event_name`. */
export interface SingleEventRule {
  readonly rule_type: 'single_event';
  readonly event_name: string;
}

/**
 * Activated when every name in `events` occurs, in order, with the
 * whole match spanning at most `time_window_hours` (first to last).
 */
export interface SequenceRule {
  readonly rule_type: 'sequence';
  readonly events: readonly string[];
  readonly time_window_hours: number;
}

/**
 * Boolean combination of sub-rules.
 * AND activates at the latest child activation, OR at the earliest.
 */
export interface CompositeRule {
  readonly rule_type: 'composite';
  readonly operator: CompositeOperator;
  readonly sub_rules: readonly ActivationRule[];
}

/** Closed set of rule shapes, discriminated by `rule_type`. */
export type ActivationRule = SingleEventRule | SequenceRule | CompositeRule;

export type RuleType = ActivationRule['rule_type'];

/**
 * Result of evaluating a rule against one subject's history.
 * `activated_at` is set if and only if `activated` is true.
 */
export type ActivationVerdict =
  | { readonly activated: false; readonly activated_at: null }
  | { readonly activated: true; readonly activated_at: string };

/** Event reference recorded in a trace. `event_id` is null for unsaved events. */
export interface MatchedEvent {
  readonly event_id: string | null;
  readonly name: string;
  readonly occurred_at: string;
}

/**
 * Per-node explanation of a verdict.
 *
 * `matched` holds the events that produced this node's activation
 * (empty when not activated). Composite nodes carry their children's
 * traces in `sub_rules`.
 */
export type ActivationTrace = ActivationVerdict & {
  readonly rule_type: RuleType;
  readonly matched: readonly MatchedEvent[];
  readonly sub_rules?: readonly ActivationTrace[];
};

/**
 * A named, versioned rule owned by a workspace.
 * Timestamps are ISO-8601; `last_verified` is null until someone verifies it.
 */
export interface ActivationDefinition {
  readonly definition_id: string;
  readonly workspace_id: string;
  readonly name: string;
  readonly description: string | null;
  readonly rule: ActivationRule;
  readonly confidence: ConfidenceLevel;
  readonly version: number;
  readonly is_active: boolean;
  readonly last_verified: string | null;
  readonly created_by: string;
  readonly created_at: string;
  readonly updated_at: string;
}
