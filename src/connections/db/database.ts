import type { PoolClient } from 'pg';
import { pool } from './connection';
import { logger } from '../../utils/logging';
import { PgUserRepository, type UserRepository } from '../../modules/users/users.repository';
import { PgProductRepository, type ProductRepository } from '../../modules/products/products.repository';
import { PgOrderRepository, type OrderRepository } from '../../modules/orders/orders.repository';

/**
 * Repositories bound to one connection. Inside `transaction` they all share
 * the same BEGIN ... COMMIT block.
 */
export interface Repositories {
  users: UserRepository;
  products: ProductRepository;
  orders: OrderRepository;
}

export interface Database {
  /** Run read-only work on a pooled connection */
  read<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  /** Run work atomically; any thrown error rolls everything back */
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}

const bindRepositories = (client: PoolClient): Repositories => ({
  users: new PgUserRepository(client),
  products: new PgProductRepository(client),
  orders: new PgOrderRepository(client),
});

export class PgDatabase implements Database {
  async read<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      return await work(bindRepositories(client));
    } finally {
      client.release();
    }
  }

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(bindRepositories(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('Rollback failed', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
      throw error;
    } finally {
      client.release();
    }
  }
}

export const database: Database = new PgDatabase();
