import type { Pool, PoolClient, QueryResultRow } from 'pg';

export interface DbResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

/**
 * The one query method repositories depend on. Satisfied by the pool for
 * plain reads and by a checked-out client inside a transaction.
 */
export interface DbExecutor {
  query(text: string, values?: unknown[]): Promise<DbResult>;
}

export const poolExecutor = (pool: Pool): DbExecutor => ({
  query: (text, values) => pool.query(text, values),
});

export const clientExecutor = (client: PoolClient): DbExecutor => ({
  query: (text, values) => client.query(text, values),
});
