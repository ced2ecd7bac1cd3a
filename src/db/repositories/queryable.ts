import type { QueryResult, QueryResultRow } from 'pg'

/**
 * The slice of `pg.Pool` / `pg.PoolClient` the repositories depend on.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryResult<R>>
}

export const UNIQUE_VIOLATION = '23505'

export const isPgErrorCode = (error: unknown, code: string): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === code
