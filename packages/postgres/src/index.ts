// Schema
export { schema, SCHEMA_VERSION, applySchema } from './schema';

// Stores
export { PgFlowTokenStore } from './token-store';
export type { PgQueryable } from './queryable';

// Factory
export { createPgStores, type PgStores, type PgStoresOptions } from './factory';
