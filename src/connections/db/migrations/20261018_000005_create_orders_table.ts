import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        shopkeeper_id INTEGER NOT NULL REFERENCES users(id) ON DELETE RESTRICT,
        warehouse_id INTEGER NOT NULL REFERENCES warehouses(id) ON DELETE RESTRICT,
        status VARCHAR(20) NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'accepted', 'rejected', 'assigned', 'in_transit', 'delivered', 'cancelled')),
        total_amount DECIMAL(10, 2) NOT NULL CHECK (total_amount >= 0),
        rejection_reason TEXT,
        cancellation_reason TEXT,
        cancelled_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        notes TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT orders_rejection_reason_check CHECK (status <> 'rejected' OR rejection_reason IS NOT NULL)
      )
    `);

    // At most one pending or accepted order per shopkeeper and warehouse
    await db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_orders_in_flight
      ON orders(shopkeeper_id, warehouse_id)
      WHERE status IN ('pending', 'accepted')
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_shopkeeper ON orders(shopkeeper_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_warehouse_status ON orders(warehouse_id, status)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await db.query('DROP INDEX IF EXISTS idx_orders_warehouse_status');
    await db.query('DROP INDEX IF EXISTS idx_orders_shopkeeper');
    await db.query('DROP INDEX IF EXISTS idx_orders_in_flight');
    await db.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
