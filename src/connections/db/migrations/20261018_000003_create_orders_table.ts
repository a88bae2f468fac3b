import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        user_id UUID NOT NULL REFERENCES users(id),
        locator VARCHAR(4) NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'created'
          CHECK (status IN ('created', 'confirmed', 'preparing', 'ready', 'delivered', 'cancelled')),
        total DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (total >= 0),
        notes VARCHAR(255),
        rating SMALLINT CHECK (rating BETWEEN 1 AND 5),
        -- One timestamp per reached status
        confirmed_at TIMESTAMPTZ,
        preparing_at TIMESTAMPTZ,
        ready_at TIMESTAMPTZ,
        delivered_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        cancelled_by UUID REFERENCES users(id) ON DELETE SET NULL,
        cancellation_reason TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_locator ON orders(locator)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_locator');
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_status');
    await client.query('DROP INDEX IF EXISTS idx_orders_user');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
