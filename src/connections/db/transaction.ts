import type { Pool } from 'pg';
import { clientExecutor, DbExecutor } from './executor';
import { logger, errorMeta } from '../../utils/logging';

export interface TransactionHandle {
  executor: DbExecutor;
  release(error?: Error): void;
}

export type TransactionConnector = () => Promise<TransactionHandle>;

export interface TransactionOptions {
  // Upper bound on waiting for a row lock; 0 or undefined waits indefinitely
  lockTimeoutMs?: number;
}

export const connectorFromPool = (pool: Pool): TransactionConnector => async () => {
  const client = await pool.connect();
  return {
    executor: clientExecutor(client),
    release: (error) => client.release(error),
  };
};

/**
 * Run `work` between BEGIN and COMMIT on one connection. Any error rolls the
 * whole unit back and is rethrown; the connection is always released.
 */
export const withTransaction = async <T>(
  connect: TransactionConnector,
  work: (db: DbExecutor) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> => {
  const handle = await connect();
  const { executor } = handle;
  let releaseError: Error | undefined;

  try {
    await executor.query('BEGIN');

    if (options.lockTimeoutMs && options.lockTimeoutMs > 0) {
      await executor.query(`SET LOCAL lock_timeout = ${Math.floor(options.lockTimeoutMs)}`);
    }

    const result = await work(executor);
    await executor.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await executor.query('ROLLBACK');
    } catch (rollbackError) {
      // A connection that cannot roll back must not go back to the pool
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.error('Transaction rollback failed', errorMeta(rollbackError));
    }
    throw error;
  } finally {
    handle.release(releaseError);
  }
};
