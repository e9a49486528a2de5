import type { Sql } from 'postgres';

/**
 * Creates tables and indexes if they don't exist (lightweight migration via raw SQL).
 *
 * drizzle-kit migrate is the production path; this guarantees the tables
 * are present on first local run. Mirrors schema.ts.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS subject_events (
      event_id     UUID PRIMARY KEY,
      seq          BIGSERIAL    NOT NULL,
      workspace_id VARCHAR(255) NOT NULL,
      subject_id   VARCHAR(255) NOT NULL,
      name         VARCHAR(255) NOT NULL,
      occurred_at  TIMESTAMPTZ  NOT NULL,
      properties   JSONB        NOT NULL DEFAULT '{}',
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS activation_definitions (
      definition_id UUID PRIMARY KEY,
      workspace_id  VARCHAR(255) NOT NULL,
      name          VARCHAR(255) NOT NULL,
      description   TEXT,
      rule          JSONB        NOT NULL,
      confidence    VARCHAR(10)  NOT NULL DEFAULT 'medium',
      version       INTEGER      NOT NULL DEFAULT 1,
      is_active     BOOLEAN      NOT NULL DEFAULT true,
      last_verified TIMESTAMPTZ,
      created_by    VARCHAR(255) NOT NULL,
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS subject_activations (
      definition_id      UUID         NOT NULL,
      subject_id         VARCHAR(255) NOT NULL,
      workspace_id       VARCHAR(255) NOT NULL,
      definition_version INTEGER      NOT NULL,
      activated_at       TIMESTAMPTZ  NOT NULL,
      recorded_at        TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      PRIMARY KEY (definition_id, subject_id)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS audit_logs (
      log_id        UUID PRIMARY KEY,
      workspace_id  VARCHAR(255) NOT NULL,
      user_id       VARCHAR(255) NOT NULL,
      action        VARCHAR(64)  NOT NULL,
      resource_type VARCHAR(64)  NOT NULL,
      resource_id   VARCHAR(255) NOT NULL,
      old_value     JSONB,
      new_value     JSONB,
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_subject_events_subject ON subject_events (workspace_id, subject_id, occurred_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_subject_events_name ON subject_events (name)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_activation_definitions_workspace ON activation_definitions (workspace_id, is_active)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_subject_activations_recorded_at ON subject_activations (recorded_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_audit_logs_resource ON audit_logs (resource_type, resource_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_audit_logs_workspace ON audit_logs (workspace_id, created_at)`);
}
