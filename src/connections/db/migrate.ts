import { pool } from './connection';
import { DbExecutor, poolExecutor } from './executor';
import { connectorFromPool, withTransaction } from './transaction';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger, errorMeta } from '../../utils/logging';

// Create migrations table if not exists
const createMigrationsTable = async (db: DbExecutor): Promise<void> => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (db: DbExecutor, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

// Schema change and bookkeeping row commit together
const runMigration = async (name: string, migration: Migration): Promise<void> => {
  await withTransaction(connectorFromPool(pool), async (db) => {
    await migration.up(db);
    await db.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  });
  logger.info(`Migration ${name} executed successfully`);
};

const rollbackMigration = async (name: string, migration: Migration): Promise<void> => {
  await withTransaction(connectorFromPool(pool), async (db) => {
    await migration.down(db);
    await db.query('DELETE FROM migrations WHERE name = $1', [name]);
  });
  logger.info(`Migration ${name} rolled back successfully`);
};

// Run all pending migrations
export const migrate = async (): Promise<void> => {
  const db = poolExecutor(pool);

  try {
    logger.info('Starting database migrations...');
    await createMigrationsTable(db);
    logger.info(`Found ${migrations.length} migration files`);

    for (const { name, migration } of migrations) {
      if (await isMigrationExecuted(db, name)) {
        logger.info(`Migration ${name} already executed, skipping`);
        continue;
      }

      await runMigration(name, migration);
    }

    logger.info('All migrations completed successfully');
  } catch (error) {
    logger.error('Migration error', errorMeta(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Rollback last migration
export const rollback = async (): Promise<void> => {
  const db = poolExecutor(pool);

  try {
    logger.info('Rolling back last migration...');
    await createMigrationsTable(db);

    const result = await db.query('SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1');

    if (result.rows.length === 0) {
      logger.info('No migrations to rollback');
      return;
    }

    const lastMigrationName = String(result.rows[0].name);
    const migrationInfo = migrations.find((m) => m.name === lastMigrationName);

    if (!migrationInfo) {
      logger.error(`Migration ${lastMigrationName} not found in migrations list`);
      process.exitCode = 1;
      return;
    }

    await rollbackMigration(lastMigrationName, migrationInfo.migration);
    logger.info('Rollback completed successfully');
  } catch (error) {
    logger.error('Rollback error', errorMeta(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback() : migrate();
  task.catch((error: unknown) => {
    logger.error('Migration runner crashed', errorMeta(error));
    process.exitCode = 1;
  });
}
