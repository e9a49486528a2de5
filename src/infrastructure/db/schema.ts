import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  jsonb,
  integer,
  boolean,
  bigserial,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `subject_events` table.
 *
 * `event_id` is the natural primary key, assigned at ingestion time,
 * giving idempotent inserts via ON CONFLICT DO NOTHING.
 * `seq` records arrival order and breaks `occurred_at` ties.
 */
export const subjectEvents = pgTable('subject_events', {
  event_id: uuid('event_id').primaryKey(),
  seq: bigserial('seq', { mode: 'number' }).notNull(),
  workspace_id: varchar('workspace_id', { length: 255 }).notNull(),
  subject_id: varchar('subject_id', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  occurred_at: timestamp('occurred_at', { withTimezone: true }).notNull(),
  properties: jsonb('properties').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_subject_events_subject').on(table.workspace_id, table.subject_id, table.occurred_at),
  index('idx_subject_events_name').on(table.name),
]);

/**
 * Drizzle schema for the `activation_definitions` table.
 *
 * `rule` holds the tagged-union rule tree as JSONB. Deletes are soft
 * (`is_active = false`) so recorded activations keep their definition.
 */
export const activationDefinitions = pgTable('activation_definitions', {
  definition_id: uuid('definition_id').primaryKey(),
  workspace_id: varchar('workspace_id', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  description: text('description'),
  rule: jsonb('rule').notNull(),
  confidence: varchar('confidence', { length: 10 }).notNull().default('medium'),
  version: integer('version').notNull().default(1),
  is_active: boolean('is_active').notNull().default(true),
  last_verified: timestamp('last_verified', { withTimezone: true }),
  created_by: varchar('created_by', { length: 255 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_activation_definitions_workspace').on(table.workspace_id, table.is_active),
]);

/**
 * Drizzle schema for the `subject_activations` table.
 *
 * One row per (definition, subject): the first recorded activation.
 */
export const subjectActivations = pgTable('subject_activations', {
  definition_id: uuid('definition_id').notNull(),
  subject_id: varchar('subject_id', { length: 255 }).notNull(),
  workspace_id: varchar('workspace_id', { length: 255 }).notNull(),
  definition_version: integer('definition_version').notNull(),
  activated_at: timestamp('activated_at', { withTimezone: true }).notNull(),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.definition_id, table.subject_id] }),
  index('idx_subject_activations_recorded_at').on(table.recorded_at),
]);

/** Drizzle schema for the `audit_logs` table (definition changes). */
export const auditLogs = pgTable('audit_logs', {
  log_id: uuid('log_id').primaryKey(),
  workspace_id: varchar('workspace_id', { length: 255 }).notNull(),
  user_id: varchar('user_id', { length: 255 }).notNull(),
  action: varchar('action', { length: 64 }).notNull(),
  resource_type: varchar('resource_type', { length: 64 }).notNull(),
  resource_id: varchar('resource_id', { length: 255 }).notNull(),
  old_value: jsonb('old_value'),
  new_value: jsonb('new_value'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_audit_logs_resource').on(table.resource_type, table.resource_id),
  index('idx_audit_logs_workspace').on(table.workspace_id, table.created_at),
]);
