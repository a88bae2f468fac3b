import type { Product } from '../../connections/db/models';
import type { RedisClient } from '../../connections/redis/redis.connection';
import { logger, errorMeta } from '../../utils/logging';

export interface ProductPage {
  products: Product[];
  total: number;
}

/**
 * Result of a list lookup. On a miss, `slot` is where the page read from the
 * database goes; it is fixed before that read, so a page fetched across an
 * invalidation lands in a dead slot. `null` when nothing should be stored.
 */
export interface ListLookup {
  page: ProductPage | null;
  slot: string | null;
}

/**
 * Read-through cache for catalog reads. Implementations must never make a
 * request fail: a faulty cache behaves like an empty one.
 */
export interface ProductCache {
  getProduct(id: number): Promise<Product | null>;
  setProduct(product: Product): Promise<void>;
  getList(key: string): Promise<ListLookup>;
  setList(slot: string, page: ProductPage): Promise<void>;
  invalidateProduct(id: number): Promise<void>;
  invalidateLists(): Promise<void>;
}

// JSON turns dates into strings, bring them back
const reviveProduct = (raw: Product): Product => ({
  ...raw,
  created_at: new Date(raw.created_at),
  updated_at: new Date(raw.updated_at),
});

export class RedisProductCache implements ProductCache {
  private static readonly LIST_VERSION_KEY = 'products:list:version';

  constructor(
    private readonly client: RedisClient,
    private readonly expireInSeconds: number
  ) {}

  private productKey(id: number): string {
    return `product:${id}`;
  }

  /**
   * List keys embed a version counter; bumping it orphans every cached page,
   * which then expires on its own TTL.
   */
  private async listKey(key: string): Promise<string> {
    const version = (await this.client.get(RedisProductCache.LIST_VERSION_KEY)) ?? '0';
    return `products:list:${version}:${key}`;
  }

  private async attempt<T>(operation: string, fallback: T, work: () => Promise<T>): Promise<T> {
    if (!this.client.isReady) {
      return fallback;
    }
    try {
      return await work();
    } catch (error) {
      logger.warn(`[ProductCache] ${operation} failed, falling back to database`, errorMeta(error));
      return fallback;
    }
  }

  async getProduct(id: number): Promise<Product | null> {
    return this.attempt('getProduct', null, async () => {
      const data = await this.client.get(this.productKey(id));
      return data ? reviveProduct(JSON.parse(data)) : null;
    });
  }

  async setProduct(product: Product): Promise<void> {
    await this.attempt('setProduct', undefined, async () => {
      await this.client.setEx(this.productKey(product.id), this.expireInSeconds, JSON.stringify(product));
    });
  }

  async getList(key: string): Promise<ListLookup> {
    return this.attempt<ListLookup>('getList', { page: null, slot: null }, async () => {
      const slot = await this.listKey(key);
      const data = await this.client.get(slot);
      if (!data) {
        return { page: null, slot };
      }
      const page: ProductPage = JSON.parse(data);
      return { page: { total: page.total, products: page.products.map(reviveProduct) }, slot };
    });
  }

  async setList(slot: string, page: ProductPage): Promise<void> {
    await this.attempt('setList', undefined, async () => {
      await this.client.setEx(slot, this.expireInSeconds, JSON.stringify(page));
    });
  }

  async invalidateProduct(id: number): Promise<void> {
    await this.attempt('invalidateProduct', undefined, async () => {
      await this.client.del(this.productKey(id));
    });
  }

  async invalidateLists(): Promise<void> {
    await this.attempt('invalidateLists', undefined, async () => {
      await this.client.incr(RedisProductCache.LIST_VERSION_KEY);
    });
  }
}
