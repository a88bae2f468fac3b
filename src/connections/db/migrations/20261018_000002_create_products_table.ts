import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(80) UNIQUE NOT NULL,
        description VARCHAR(255),
        price DECIMAL(10, 2) NOT NULL CHECK (price >= 0),
        category VARCHAR(20) NOT NULL
          CHECK (category IN ('FOOD', 'DRINK', 'DESSERT', 'SNACK')),
        -- Soft delete: unavailable products stay referenced by open orders
        is_available BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_products_category ON products(category)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_products_available ON products(is_available) WHERE is_available = TRUE
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_products_available');
    await client.query('DROP INDEX IF EXISTS idx_products_category');
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
