import { applySchema } from './schema';
import { PgFlowTokenStore } from './token-store';
import type { PgQueryable } from './queryable';

export interface PgStores {
  tokens: PgFlowTokenStore;
}

export interface PgStoresOptions {
  /** Run `applySchema` first (default: false) */
  migrate?: boolean;
}

/**
 * Create all Postgres stores from a single pool.
 */
export async function createPgStores(pool: PgQueryable, options: PgStoresOptions = {}): Promise<PgStores> {
  if (options.migrate) {
    await applySchema(pool);
  }

  return {
    tokens: new PgFlowTokenStore(pool),
  };
}
