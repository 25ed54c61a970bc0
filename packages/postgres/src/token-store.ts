import type { FlowToken, FlowTokenStore, NewFlowToken, TokenRotation } from '@flowgate/core';
import type { PgQueryable } from './queryable';

interface FlowTokenRow {
  identifier: string;
  key: string;
  user_id: string;
  flow_slug: string;
  /** BIGINT columns arrive as strings */
  expires_at: string | number;
  created_at: string | number;
  used_at: string | number | null;
  plan: string;
}

/**
 * Postgres-backed token store. Uniqueness and compare-and-swap are left to
 * single statements, so concurrent requests on different nodes stay consistent.
 */
export class PgFlowTokenStore implements FlowTokenStore {
  constructor(private readonly pool: PgQueryable) {}

  private rowToToken(row: FlowTokenRow): FlowToken {
    return {
      identifier: row.identifier,
      key: row.key,
      userId: row.user_id,
      flowSlug: row.flow_slug,
      expiresAt: Number(row.expires_at),
      createdAt: Number(row.created_at),
      usedAt: row.used_at === null ? null : Number(row.used_at),
      plan: row.plan,
    };
  }

  async getOrCreate(record: NewFlowToken): Promise<{ token: FlowToken; created: boolean }> {
    const inserted = await this.pool.query<FlowTokenRow>(
      `INSERT INTO fg_flow_tokens (identifier, key, user_id, flow_slug, expires_at, created_at, used_at, plan)
       VALUES ($1, $2, $3, $4, $5, $6, NULL, $7)
       ON CONFLICT (identifier) DO NOTHING
       RETURNING *`,
      [record.identifier, record.key, record.userId, record.flowSlug, record.expiresAt, record.createdAt, record.plan]
    );
    if (inserted.rows.length > 0) {
      return { token: this.rowToToken(inserted.rows[0]), created: true };
    }

    const existing = await this.findByIdentifier(record.identifier);
    if (!existing) {
      throw new Error(`Flow token "${record.identifier}" conflicted on insert but was not found`);
    }
    return { token: existing, created: false };
  }

  async findByKey(key: string): Promise<FlowToken | null> {
    const result = await this.pool.query<FlowTokenRow>('SELECT * FROM fg_flow_tokens WHERE key = $1', [key]);
    return result.rows.length > 0 ? this.rowToToken(result.rows[0]) : null;
  }

  async findByIdentifier(identifier: string): Promise<FlowToken | null> {
    const result = await this.pool.query<FlowTokenRow>('SELECT * FROM fg_flow_tokens WHERE identifier = $1', [identifier]);
    return result.rows.length > 0 ? this.rowToToken(result.rows[0]) : null;
  }

  async listByUser(userId: string): Promise<FlowToken[]> {
    const result = await this.pool.query<FlowTokenRow>(
      'SELECT * FROM fg_flow_tokens WHERE user_id = $1 ORDER BY created_at',
      [userId]
    );
    return result.rows.map(r => this.rowToToken(r));
  }

  async rotate(
    identifier: string,
    expectedKey: string,
    next: TokenRotation
  ): Promise<{ token: FlowToken; rotated: boolean } | null> {
    const { reissue } = next;
    const updated = await this.pool.query<FlowTokenRow>(
      `UPDATE fg_flow_tokens SET key = $3, expires_at = $4, used_at = NULL,
         user_id = COALESCE($5, user_id), flow_slug = COALESCE($6, flow_slug), plan = COALESCE($7, plan)
       WHERE identifier = $1 AND key = $2
       RETURNING *`,
      [
        identifier,
        expectedKey,
        next.key,
        next.expiresAt,
        reissue?.userId ?? null,
        reissue?.flowSlug ?? null,
        reissue?.plan ?? null,
      ]
    );
    if (updated.rows.length > 0) {
      return { token: this.rowToToken(updated.rows[0]), rotated: true };
    }

    const current = await this.findByIdentifier(identifier);
    return current ? { token: current, rotated: false } : null;
  }

  async markUsed(key: string, usedAt: number): Promise<boolean> {
    const result = await this.pool.query(
      'UPDATE fg_flow_tokens SET used_at = $2 WHERE key = $1 AND used_at IS NULL',
      [key, usedAt]
    );
    return result.rowCount === 1;
  }

  async purgeExpired(before: number): Promise<number> {
    const result = await this.pool.query('DELETE FROM fg_flow_tokens WHERE expires_at < $1', [before]);
    return result.rowCount ?? 0;
  }
}
