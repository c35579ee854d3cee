import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS deliveries (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        rider_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'assigned'
          CHECK (status IN ('assigned', 'in_transit', 'delivered', 'failed')),
        delivery_fee DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (delivery_fee >= 0),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT deliveries_order_id_key UNIQUE (order_id)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_deliveries_rider ON deliveries(rider_id)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_deliveries_rider');
    await db.query('DROP TABLE IF EXISTS deliveries CASCADE');
  },
};
