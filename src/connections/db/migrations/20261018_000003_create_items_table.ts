import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    // items_quantity_check is the last line of defence against overselling
    await db.query(`
      CREATE TABLE IF NOT EXISTS items (
        id SERIAL PRIMARY KEY,
        warehouse_id INTEGER NOT NULL REFERENCES warehouses(id) ON DELETE CASCADE,
        name VARCHAR(255) NOT NULL,
        description TEXT,
        sku VARCHAR(100) UNIQUE NOT NULL,
        price DECIMAL(10, 2) NOT NULL,
        quantity INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT items_quantity_check CHECK (quantity >= 0),
        CONSTRAINT items_price_check CHECK (price >= 0)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_items_warehouse ON items(warehouse_id)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_items_warehouse');
    await db.query('DROP TABLE IF EXISTS items CASCADE');
  },
};
