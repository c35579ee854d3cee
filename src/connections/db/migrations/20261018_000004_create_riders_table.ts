import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS riders (
        id SERIAL PRIMARY KEY,
        user_id INTEGER UNIQUE NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        warehouse_id INTEGER NOT NULL REFERENCES warehouses(id) ON DELETE CASCADE,
        status VARCHAR(20) NOT NULL DEFAULT 'available'
          CHECK (status IN ('available', 'busy', 'inactive')),
        is_suspended BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_riders_warehouse ON riders(warehouse_id)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_riders_warehouse');
    await db.query('DROP TABLE IF EXISTS riders CASCADE');
  },
};
