import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS warehouses (
        id SERIAL PRIMARY KEY,
        admin_id INTEGER NOT NULL REFERENCES users(id) ON DELETE RESTRICT,
        name VARCHAR(255) NOT NULL,
        address TEXT NOT NULL,
        latitude DECIMAL(9, 6),
        longitude DECIMAL(9, 6),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        is_approved BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_warehouses_admin ON warehouses(admin_id)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_warehouses_admin');
    await db.query('DROP TABLE IF EXISTS warehouses CASCADE');
  },
};
