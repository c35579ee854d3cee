import { DbExecutor } from '../executor';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: DbExecutor) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) UNIQUE,
        phone VARCHAR(20) UNIQUE,
        full_name VARCHAR(255),
        status VARCHAR(20) NOT NULL DEFAULT 'active'
          CHECK (status IN ('active', 'banned', 'deleted')),
        role VARCHAR(30) NOT NULL
          CHECK (role IN ('SHOPKEEPER', 'WAREHOUSE_MANAGER', 'RIDER', 'ADMIN')),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT users_contact_check CHECK (email IS NOT NULL OR phone IS NOT NULL)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_users_role ON users(role)
    `);
  },

  async down(db: DbExecutor) {
    await db.query('DROP INDEX IF EXISTS idx_users_role');
    await db.query('DROP TABLE IF EXISTS users CASCADE');
  },
};
