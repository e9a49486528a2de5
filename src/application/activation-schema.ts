import { z } from 'zod';
import { ValidationError, validateRule } from '../domain/index.js';
import type { ActivationRule } from '../domain/index.js';

/**
 * Zod schema for the tagged-union rule tree.
 *
 * Checks shape only (types and the `rule_type` discriminant). Structural
 * invariants such as non-empty sequences and positive windows are
 * enforced by `validateRule()` so they fail with the offending field named.
 */
export const activationRuleSchema: z.ZodType<ActivationRule> = z.lazy(() =>
  z.discriminatedUnion('rule_type', [
    z.object({
      rule_type: z.literal('single_event'),
      event_name: z.string(),
    }),
    z.object({
      rule_type: z.literal('sequence'),
      events: z.array(z.string()),
      time_window_hours: z.number(),
    }),
    z.object({
      rule_type: z.literal('composite'),
      operator: z.enum(['AND', 'OR']),
      sub_rules: z.array(activationRuleSchema),
    }),
  ]),
);

export const confidenceSchema = z.enum(['high', 'medium', 'low']);

/** Formats a zod issue path as `rule.sub_rules[0].events[1]`. */
function formatPath(root: string, path: readonly (string | number)[]): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    root,
  );
}

/**
 * Parses an untrusted value (request body, JSONB column) into a valid rule.
 * Throws ValidationError naming the first offending field.
 */
export function parseActivationRule(value: unknown, path: string = 'rule'): ActivationRule {
  const parsed = activationRuleSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid rule', formatPath(path, issue?.path ?? []));
  }
  validateRule(parsed.data, path);
  return parsed.data;
}

/**
 * Schema for POST /api/v1/workspaces/:workspace_id/activations.
 * `confidence` defaults to medium.
 */
export const createDefinitionSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().max(2000).nullable().optional().default(null),
  rule: activationRuleSchema,
  confidence: confidenceSchema.optional().default('medium'),
});

export type CreateDefinitionBody = z.infer<typeof createDefinitionSchema>;

/**
 * Schema for PATCH /api/v1/workspaces/:workspace_id/activations/:definition_id.
 * All fields optional; every accepted patch bumps the version.
 */
export const patchDefinitionSchema = z.object({
  name: z.string().min(1).max(255).optional(),
  description: z.string().max(2000).nullable().optional(),
  rule: activationRuleSchema.optional(),
  confidence: confidenceSchema.optional(),
}).refine(
  (data) => Object.values(data).some((value) => value !== undefined),
  { message: 'At least one field must be provided' },
);

export type PatchDefinitionBody = z.infer<typeof patchDefinitionSchema>;

/** Schema for POST .../activations/:definition_id/verify. */
export const verifyDefinitionSchema = z.object({
  confidence: confidenceSchema.optional(),
});

export type VerifyDefinitionBody = z.infer<typeof verifyDefinitionSchema>;

const isoDatetime = z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' });

/**
 * Schema for POST .../activations/:definition_id/evaluate.
 * Either `subject_ids` or `from` must bound the history that is read.
 */
export const evaluateDefinitionSchema = z.object({
  subject_ids: z.array(z.string().min(1).max(255)).min(1).max(1000).optional(),
  from: isoDatetime.optional(),
  to: isoDatetime.optional(),
}).refine(
  (data) => data.subject_ids !== undefined || data.from !== undefined,
  { message: 'Provide subject_ids or from to bound the evaluation', path: ['subject_ids'] },
).refine(
  (data) => data.from === undefined || data.to === undefined || Date.parse(data.from) <= Date.parse(data.to),
  { message: 'from must not be after to', path: ['from'] },
);

export type EvaluateDefinitionBody = z.infer<typeof evaluateDefinitionSchema>;

/**
 * Schema for POST /api/v1/activations/preview.
 * Events need no `event_id`; they all belong to `subject_id`.
 */
export const previewSchema = z.object({
  rule: z.unknown(),
  subject_id: z.string().min(1).max(255).optional().default('preview'),
  events: z.array(z.object({
    event_id: z.string().min(1).optional(),
    name: z.string().min(1).max(255),
    occurred_at: isoDatetime,
  })).max(10_000),
});

export type PreviewBody = z.infer<typeof previewSchema>;
