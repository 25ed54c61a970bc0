import type { PgQueryable } from './queryable';

export const SCHEMA_VERSION = '1.0.0';

export const schema = `
-- ============================================
-- FlowGate Postgres Schema v${SCHEMA_VERSION}
-- ============================================

-- Flow tokens: one per (stage, user) identifier
CREATE TABLE IF NOT EXISTS fg_flow_tokens (
  identifier      TEXT PRIMARY KEY,
  key             TEXT NOT NULL UNIQUE,
  user_id         TEXT NOT NULL,
  flow_slug       TEXT NOT NULL,
  expires_at      BIGINT NOT NULL,
  created_at      BIGINT NOT NULL,
  used_at         BIGINT,
  plan            TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_fg_tokens_user ON fg_flow_tokens(user_id);
CREATE INDEX IF NOT EXISTS idx_fg_tokens_expires ON fg_flow_tokens(expires_at);
`;

/**
 * Apply schema to database.
 */
export async function applySchema(pool: PgQueryable): Promise<void> {
  await pool.query(schema);
}
