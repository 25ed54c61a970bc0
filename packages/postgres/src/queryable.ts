import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The part of `pg.Pool` (or `pg.Client`) the stores use.
 */
export interface PgQueryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}
