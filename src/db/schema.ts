// =============================================================================
// PATHGUARD — Schema Initialization
//
// Idempotent; run on every startup. Tickets and feedback reference the
// profile table; removal still deletes them explicitly before the profile.
// =============================================================================

import { Pool } from 'pg';

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS user_access_profiles (
     email             TEXT PRIMARY KEY,
     hierarchy_level   INTEGER NOT NULL DEFAULT 0 CHECK (hierarchy_level >= 0),
     departments       JSONB NOT NULL DEFAULT '[]'::jsonb,
     projects          JSONB NOT NULL DEFAULT '[]'::jsonb,
     contextual_roles  JSONB NOT NULL DEFAULT '{}'::jsonb,
     created_at        TIMESTAMPTZ NOT NULL DEFAULT now(),
     updated_at        TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  `CREATE TABLE IF NOT EXISTS document_requirements (
     source_path  TEXT PRIMARY KEY,
     requirement  JSONB NOT NULL,
     derived_at   TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  `CREATE TABLE IF NOT EXISTS tickets (
     id            UUID PRIMARY KEY,
     user_email    TEXT NOT NULL REFERENCES user_access_profiles(email) ON DELETE CASCADE,
     question      TEXT NOT NULL,
     chat_history  TEXT NOT NULL,
     team          TEXT NOT NULL,
     status        TEXT NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'closed')),
     created_at    TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  `CREATE TABLE IF NOT EXISTS feedback (
     id          UUID PRIMARY KEY,
     user_email  TEXT NOT NULL REFERENCES user_access_profiles(email) ON DELETE CASCADE,
     question    TEXT NOT NULL,
     answer      TEXT NOT NULL,
     rating      TEXT NOT NULL CHECK (rating IN ('helpful', 'not_helpful')),
     created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  `CREATE TABLE IF NOT EXISTS audit_trail (
     id           UUID PRIMARY KEY,
     event_time   TIMESTAMPTZ NOT NULL,
     category     TEXT NOT NULL,
     event_type   TEXT NOT NULL,
     description  TEXT NOT NULL,
     actor_email  TEXT,
     target_type  TEXT,
     target_id    TEXT,
     metadata     JSONB NOT NULL DEFAULT '{}'::jsonb,
     event_hash   TEXT NOT NULL
   )`,

  `CREATE INDEX IF NOT EXISTS idx_tickets_created ON tickets (created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_time ON audit_trail (event_time DESC)`,
];

export async function initSchema(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    for (const statement of STATEMENTS) {
      await client.query(statement);
    }
    console.log('[DB] Schema verified');
  } finally {
    client.release();
  }
}
